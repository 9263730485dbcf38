// Task Types
export {
  TaskTrigger,
  TaskVisibility,
  RunLevel,
  TaskState,
  MAX_RESTARTS_LIMIT,
  restartPolicySchema,
  powerPolicySchema,
  taskSpecificationSchema,
  type RestartPolicy,
  type PowerPolicy,
  type TaskSpecification,
  type ExecutionTarget,
} from './task.js';

// Result Types
export { ok, err, type Result } from './result.js';
