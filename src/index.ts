export { Orchestrator, renderStackEnv, DATA_SUBDIRS } from './orchestrator.js';
export type { OrchestratorConfig, Phase, Progress } from './orchestrator.js';

export { ConfigSchema, resolveConfig, splitHostList, unknownKeys } from './config/schema.js';
export type { Configuration, RawConfig } from './config/schema.js';
export { DEFAULT_CONFIG_PATH, describeConfig, loadConfig, loadRawConfig, writeConfigTemplate } from './config/loader.js';
export { expandHome, parseLogLevel, validate, validateIp, validateIpOrHostname, validatePort } from './config/validator.js';
export type { ClusterSettings, Host, HostRole, StackKey } from './config/types.js';

export { RemoteExecutor, redactText } from './remote/executor.js';
export type { ExecutionResult, ExecuteOptions } from './remote/executor.js';
export { CONNECTION_LOST_EXIT_CODE } from './remote/transport.js';
export type { RemoteTransport, RemoteProcess, CopyResult } from './remote/transport.js';
export { SshTransport } from './remote/ssh.js';

export { SwarmControlPlane, parseSwarmStatus, parseReplicas, isConverged } from './engine/swarm.js';
export { NodeBootstrapper } from './cluster/bootstrap.js';
export { JoinCoordinator } from './cluster/join.js';
export { NodeStateTracker } from './cluster/state.js';
export { JoinToken } from './cluster/token.js';
export { StackDeployer, STACKS, enabledStacks } from './deploy/stacks.js';
export { VerificationReporter, accessSummary, buildReport, tally } from './report/reporter.js';
export type { RunReport } from './report/reporter.js';
export { tcpProbe } from './report/probe.js';

export { pollUntil } from './util/retry.js';
export type { RetryPolicy, PollResult } from './util/retry.js';
export { createLogger, pruneLogs } from './logging.js';
export * from './errors.js';
