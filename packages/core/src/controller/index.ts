export {
  CachePolicyController,
  type CachePolicyControllerOptions,
} from './cache-policy-controller';
export { ControllerRegistry, type ControllerRegistryOptions } from './controller-registry';
