import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CallAbortedError, CallTimeoutError } from '@pactwire/core';
import { MeshAgent } from '../src/agent.js';
import { generateIdentity } from '../src/identity/keys.js';
import { canonicalize } from '../src/identity/serialize.js';
import { createRequestEnvelope, verifyResponseEnvelope } from '../src/protocol/envelope.js';
import { LocalNetwork, LocalTransport } from '../src/transport/local.js';
import { echoHandler, echoService } from './fixtures/services.js';

const never = () => new Promise<unknown>(() => undefined);

describe('MeshAgent over LocalTransport', () => {
  let network: LocalNetwork;
  let agentA: MeshAgent;
  let agentB: MeshAgent;

  beforeEach(async () => {
    network = new LocalNetwork();
    agentA = new MeshAgent(new LocalTransport('agent-A', network));
    agentB = new MeshAgent(new LocalTransport('agent-B', network));

    agentB.register(echoService, echoHandler);
    agentB.register({ name: 'slow', description: 'Never answers' }, never);
    agentB.register({ name: 'broken', description: 'Always fails' }, async () => {
      throw new Error('boom');
    });

    await agentB.start();
    await agentA.start();
  });

  afterEach(async () => {
    await agentA.stop();
    await agentB.stop();
  });

  it('discovers agent B by service name', async () => {
    expect(await agentA.discover('echo')).toEqual(['agent-B']);
  });

  it('sends a request and gets a signed response', async () => {
    const response = await agentA.request(agentB.peerId, 'echo', { message: 'hello' });
    expect(response.result).toEqual({ echo: 'hello' });
    expect(verifyResponseEnvelope(response)).toBe(true);
  });

  it('answers unknown services, invalid payloads and handler failures with errors', async () => {
    const unknown = await agentA.request(agentB.peerId, 'nonexistent', { data: 1 });
    expect(unknown.result).toEqual({ error: 'unknown service: nonexistent' });

    const missing = await agentA.request(agentB.peerId, 'echo', {});
    expect(missing.result).toEqual({ error: 'Missing required field: message' });

    const wrongType = await agentA.request(agentB.peerId, 'echo', { message: 42 });
    expect(wrongType.result).toEqual({ error: 'Field message expected type string but got number' });

    const broken = await agentA.request(agentB.peerId, 'broken', {});
    expect(broken.result).toEqual({ error: 'boom' });
  });

  it('rejects tampered and misaddressed requests', async () => {
    const raw = new LocalTransport('raw', network);
    const replies: unknown[] = [];
    raw.onMessage((_peerId, msg) => replies.push(JSON.parse(new TextDecoder().decode(msg))));
    await raw.start();

    const envelope = createRequestEnvelope(generateIdentity(), 'agent-B', 'echo', { message: 'hello' });
    await raw.send('agent-B', canonicalize({ type: 'request', envelope: { ...envelope, payload: { message: 'x' } } }));
    const elsewhere = createRequestEnvelope(generateIdentity(), 'agent-C', 'echo', { message: 'hello' });
    await raw.send('agent-B', canonicalize({ type: 'request', envelope: elsewhere }));

    await vi.waitFor(() => expect(replies).toHaveLength(2));
    expect(replies).toEqual([
      expect.objectContaining({ envelope: expect.objectContaining({ result: { error: 'invalid signature' } }) }),
      expect.objectContaining({
        envelope: expect.objectContaining({ result: { error: 'request addressed to agent-C' } }),
      }),
    ]);
    await raw.stop();
  });

  it('ignores messages that are not wire messages', async () => {
    const raw = new LocalTransport('raw', network);
    await raw.start();
    await raw.send('agent-B', new TextEncoder().encode('not json'));
    await raw.send('agent-B', canonicalize({ type: 'gossip' }));
    const response = await agentA.request(agentB.peerId, 'echo', { message: 'still here' });
    expect(response.result).toEqual({ echo: 'still here' });
    await raw.stop();
  });

  it('times out a request that gets no answer', async () => {
    await expect(agentA.request(agentB.peerId, 'slow', {}, { timeoutMs: 20 })).rejects.toThrow(
      new CallTimeoutError('request slow', 20),
    );
  });

  it('stops waiting when the caller aborts', async () => {
    const controller = new AbortController();
    const pending = agentA.request(agentB.peerId, 'slow', {}, { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CallAbortedError);
  });

  it('rejects pending requests on stop', async () => {
    const pending = agentA.request(agentB.peerId, 'slow', {});
    await agentA.stop();
    await expect(pending).rejects.toThrow('Agent stopped');
  });

  it('fails to reach a peer that is not on the network', async () => {
    await expect(agentA.request('agent-Z', 'echo', { message: 'hi' })).rejects.toThrow(
      'peer not found: agent-Z',
    );
  });

  it('advertises services registered after start', async () => {
    agentB.register({ name: 'late', description: 'Registered late' }, async () => 'ok');
    await vi.waitFor(async () => expect(await agentA.discover('late')).toEqual(['agent-B']));
  });

  it('refuses to send before start', async () => {
    const idle = new MeshAgent(new LocalTransport('idle', network));
    await expect(idle.request('agent-B', 'echo', {})).rejects.toThrow('start() before sending');
  });
});
