export { IntegrationContext, runIntegration } from './integration.js';
export { argQuote } from './process/arg-quote.js';
export { ResourceScope, withResourceScope } from './process/scope.js';
export type { CleanupAction, ReleaseKey } from './process/scope.js';
export { decodeBuildPlan, readBuildPlan, findExecutable } from './process/plan.js';
export type { BuildPlan, BuildPlanComponent } from './process/plan.js';
export {
  selectBinarySource,
  resolveBinary,
  procFlex,
  procCli,
  procNode,
  procChairman,
  getProjectBase,
} from './process/resolver.js';
export type { ResolveOptions } from './process/resolver.js';
export { createProcess } from './process/launcher.js';
export { ProcessHandle, exitCodeOf } from './process/handle.js';
export { waitForProcess, waitSecondsForProcess } from './process/waiter.js';
export { execFlex, execCli } from './process/flex-exec.js';
export type { FlexExecOptions } from './process/flex-exec.js';
export { proc, shell, commandLine } from './process/types.js';
export type {
  CommandSpec,
  StdioMode,
  ProcessSpec,
  ResolvedBinary,
  BinarySource,
  LaunchedProcess,
  WaitOutcome,
} from './process/types.js';
export { HarnessError, HarnessErrorCode } from './shared/errors.js';
export { loadConfig } from './shared/config.js';
export type { HarnessConfig, LogLevel } from './shared/config.js';
export { logger } from './shared/logger.js';
