export {
  Supervisor,
  runSupervisor,
  type SupervisorDeps,
  type SupervisorOptions,
} from "./supervisor.js";

export { SupervisorClient, type SupervisorClientOptions } from "./client.js";
