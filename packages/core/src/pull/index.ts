export {
  PullOrchestrator,
  pullJobKey,
  pullWorkloadName,
  type PullRequest,
  type PullJobHandle,
  type PullOrchestratorOptions,
} from './pull-orchestrator';
