export { CONFIG_PATH_ENV, loadConfig, resolveBackend, resolveOutputDir } from './config.js';
export type { BackendConfig, Env, PactwireConfig, ResolvedBackend } from './config.js';
export {
  createToolformer,
  loadTaskFile,
  loadToolsFile,
  readProtocolFile,
  runCheck,
  runNegotiation,
  runSynthesis,
} from './runner.js';
export type { NegotiationReport, NegotiationRequest, RunContext } from './runner.js';
export { EXIT_NEGATIVE, createProgram, processIo } from './program.js';
export type { ProgramIo } from './program.js';
