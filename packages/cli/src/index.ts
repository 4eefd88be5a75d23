/**
 * @tollgate/cli — Command-line runner for metered-call reconciliation.
 *
 * @packageDocumentation
 */

export { ConfigSchema, loadConfig, cyclePolicyFromConfig } from "./config.js";
export type { CliConfig, CallParams } from "./config.js";
export {
  LeaseError,
  withLease,
  waitUntilReady,
  spawnServer,
  parseCommand,
  startSandboxServer,
  SANDBOX_CHARGING_POLICY,
} from "./lease.js";
export type {
  ServiceLease,
  LeaseErrorCode,
  ServerProcess,
  WaitUntilReadyOptions,
  SpawnServerOptions,
  StartSandboxServerOptions,
  SandboxLease,
} from "./lease.js";
export { logCycleEvent, formatObservation, formatFailure } from "./report.js";
export type { CycleLogger } from "./report.js";
export { provisionService, provisionPlanFromConfig } from "./provision.js";
export type { ProvisionPlan, ProvisionedService } from "./provision.js";
export { acquireTarget, runCli } from "./run.js";
export type { Target, TargetLease, RunOptions, AcquireOptions } from "./run.js";
