import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  AdapterProgrammer,
  GeminiToolformer,
  type Logger,
  OpenAiToolformer,
  ProtocolChecker,
  ProtocolNegotiator,
  type Protocol,
  ReceiverNegotiator,
  TaskSchema,
  type Tool,
  ToolSet,
  type Toolformer,
  silentLogger,
  toolFromStandardApi,
} from '@pactwire/core';
import {
  LocalNetwork,
  LocalTransport,
  MeshAgent,
  NEGOTIATE_SERVICE,
  meshCounterparty,
  serveNegotiation,
} from '@pactwire/mesh';
import { type Env, type PactwireConfig, resolveBackend, resolveOutputDir } from './config.js';

/** Everything a command needs besides its own arguments. */
export interface RunContext {
  config: PactwireConfig;
  toolformer: Toolformer;
  logger?: Logger;
  signal?: AbortSignal;
}

export function createToolformer(config: PactwireConfig, logger: Logger = silentLogger, env?: Env): Toolformer {
  const { provider, options } = resolveBackend(config, env);
  switch (provider) {
    case 'openai': {
      return new OpenAiToolformer({ ...options, logger });
    }
    case 'gemini': {
      return new GeminiToolformer({ ...options, logger });
    }
  }
}

function readJsonFile(file: string, what: string): unknown {
  const p = path.resolve(file);
  let raw: string;
  try {
    raw = readFileSync(p, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read ${what} file ${p}: ${message}`);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${what} file ${p}: ${message}`);
  }
}

export function loadTaskFile(file: string): TaskSchema {
  return new TaskSchema(readJsonFile(file, 'task'));
}

/**
 * Tools files hold a JSON array of standard-API tool objects with unique names. The tools are
 * described to the backend but never run here, so each one answers that it is not wired.
 */
export function loadToolsFile(file: string): Tool[] {
  const data = readJsonFile(file, 'tools');
  if (!Array.isArray(data)) {
    throw new Error(`Tools file ${path.resolve(file)} must contain a JSON array`);
  }
  const tools = data.map((info: unknown) => {
    const tool: Tool = toolFromStandardApi(info, () => `Tool ${tool.name} is not wired in this process`);
    return tool;
  });
  return ToolSet.of(tools).list();
}

export function readProtocolFile(file: string): string {
  const p = path.resolve(file);
  try {
    return readFileSync(p, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read protocol file ${p}: ${message}`);
  }
}

export async function runCheck(
  context: RunContext,
  protocolDocument: string,
  tools: readonly Tool[],
  additionalInfo?: string,
): Promise<boolean> {
  const checker = new ProtocolChecker(context.toolformer, {
    logger: context.logger,
    timeoutMs: context.config.checking?.timeoutMs,
  });
  return checker.check(protocolDocument, tools, { signal: context.signal, additionalInfo });
}

export async function runSynthesis(
  context: RunContext,
  task: TaskSchema,
  protocolDocument: string,
): Promise<string> {
  const programmer = new AdapterProgrammer(context.toolformer, {
    logger: context.logger,
    maxAttempts: context.config.programming?.maxAttempts,
    attemptTimeoutMs: context.config.programming?.attemptTimeoutMs,
  });
  return programmer.synthesize(task, protocolDocument, { signal: context.signal });
}

export interface NegotiationRequest {
  task: TaskSchema;
  /** Tools of the receiving agent. */
  tools: readonly Tool[];
  additionalInfo?: string;
  synthesize?: boolean;
}

export type NegotiationReport =
  | { status: 'exhausted'; rounds: number }
  | {
      status: 'agreed';
      protocol: Protocol;
      rounds: number;
      protocolPath: string;
      adapterPath?: string;
      feasible: boolean;
    };

const SENDER_PEER_ID = 'sender';
const RECEIVER_PEER_ID = 'receiver';

/**
 * Runs a sender and a receiver agent in this process, joined by an in-memory network, and lets
 * them negotiate through the mesh. An agreed protocol is written to the output directory,
 * optionally with an adapter, and checked against the receiver's tools.
 */
export async function runNegotiation(
  context: RunContext,
  request: NegotiationRequest,
): Promise<NegotiationReport> {
  const { config, toolformer } = context;
  const logger = context.logger ?? silentLogger;
  const roundTimeoutMs = config.negotiation?.roundTimeoutMs;

  const network = new LocalNetwork();
  const receiver = new MeshAgent(new LocalTransport(RECEIVER_PEER_ID, network), { logger });
  const sender = new MeshAgent(new LocalTransport(SENDER_PEER_ID, network), { logger });
  serveNegotiation(receiver, new ReceiverNegotiator(toolformer, { roundTimeoutMs, logger }), request.tools);

  await receiver.start();
  await sender.start();
  try {
    const [peer] = await sender.discover(NEGOTIATE_SERVICE);
    if (peer === undefined) {
      throw new Error(`No agent offers ${NEGOTIATE_SERVICE}`);
    }
    logger.info(`Negotiating with ${peer}`);

    const negotiator = new ProtocolNegotiator(toolformer, {
      maxRounds: config.negotiation?.maxRounds,
      roundTimeoutMs,
      logger,
    });
    const outcome = await negotiator.negotiate(
      request.task,
      meshCounterparty(sender, peer, { timeoutMs: roundTimeoutMs }),
      { additionalInfo: request.additionalInfo, signal: context.signal },
    );
    if (outcome.status === 'exhausted') {
      return { status: 'exhausted', rounds: outcome.rounds };
    }

    const { protocol } = outcome;
    const outputDir = resolveOutputDir(config);
    mkdirSync(outputDir, { recursive: true });
    const protocolPath = path.join(outputDir, `${protocol.id}.md`);
    writeFileSync(protocolPath, protocol.document);
    logger.info(`Protocol ${protocol.name} written to ${protocolPath}`);

    let adapterPath: string | undefined;
    if (request.synthesize) {
      const adapter = await runSynthesis(context, request.task, protocol.document);
      adapterPath = path.join(outputDir, `${protocol.id}.adapter.js`);
      writeFileSync(adapterPath, adapter);
      logger.info(`Adapter written to ${adapterPath}`);
    }

    const feasible = await runCheck(context, protocol.document, request.tools);
    return { status: 'agreed', protocol, rounds: outcome.rounds, protocolPath, adapterPath, feasible };
  } finally {
    await sender.stop();
    await receiver.stop();
  }
}
