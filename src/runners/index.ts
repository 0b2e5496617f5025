/**
 * Runner functions for the supervisor process.
 */

export {
  createSupervisor,
  startSupervisor,
  runSupervisor,
  type Supervisor,
  type SupervisorOptions,
  type ServeOptions,
  type RunningSupervisor,
} from './supervisor-runner.js';
