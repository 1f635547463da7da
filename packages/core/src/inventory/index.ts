export {
  NodeInventory,
  type InventorySnapshot,
  type NodeInventoryOptions,
} from './node-inventory';
