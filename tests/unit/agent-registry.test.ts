/**
 * Unit tests for AgentRegistry and the agent provisioners
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AgentRegistry,
  LocalAgentProvisioner,
  RemoteAgentProvisioner,
  type AgentProvisioner,
  type ProvisionedAgent,
} from '@core/agent-registry';
import { generateInstructions } from '../../src/agents/agent-instructions.js';
import type { AgentDefinition, AgentId } from '../../src/types/agent.types.js';
import { CancelledError } from '../../src/types/error.types.js';
import { Deferred, FakeAgentsClient } from '../fakes.js';
import { captureRejection } from '../setup.js';

class StubProvisioner implements AgentProvisioner {
  readonly mode = 'fallback';
  readonly results: Array<() => Promise<ProvisionedAgent>> = [];
  provision = vi.fn(async (definition: AgentDefinition): Promise<ProvisionedAgent> => {
    const next = this.results.shift();
    return next ? next() : { id: `stub-${definition.role}`, reused: false };
  });
  release = vi.fn(async (_agentId: AgentId): Promise<void> => undefined);
}

describe('AgentRegistry', () => {
  describe('resolve', () => {
    it('should provision a frozen descriptor for the role', async () => {
      const registry = new AgentRegistry(new LocalAgentProvisioner());

      const descriptor = await registry.resolve('formatter');

      expect(descriptor.id).toMatch(/^local-formatter-[0-9a-f-]{36}$/);
      expect(descriptor).toMatchObject({ role: 'formatter', name: 'FormatterAgent', mode: 'fallback', reused: false });
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(registry.mode).toBe('fallback');
    });

    it('should return the cached descriptor on later calls', async () => {
      const provisioner = new StubProvisioner();
      const registry = new AgentRegistry(provisioner);

      const first = await registry.resolve('code-analyzer');
      const second = await registry.resolve('code-analyzer');

      expect(second).toBe(first);
      expect(provisioner.provision).toHaveBeenCalledTimes(1);
    });

    it('should share one provisioning request between concurrent callers', async () => {
      const provisioner = new StubProvisioner();
      const gate = new Deferred<ProvisionedAgent>();
      provisioner.results.push(() => gate.promise);
      const registry = new AgentRegistry(provisioner);

      const first = registry.resolve('doc-generator');
      const second = registry.resolve('doc-generator');
      gate.resolve({ id: 'stub-shared', reused: false });

      const [a, b] = await Promise.all([first, second]);
      expect(a).toBe(b);
      expect(a.id).toBe('stub-shared');
      expect(provisioner.provision).toHaveBeenCalledTimes(1);
    });

    it('should allow a retry after a failed resolution', async () => {
      const provisioner = new StubProvisioner();
      provisioner.results.push(async () => {
        throw new Error('quota exceeded');
      });
      const registry = new AgentRegistry(provisioner);

      await expect(registry.resolve('formatter')).rejects.toThrow('quota exceeded');
      await expect(registry.resolve('formatter')).resolves.toMatchObject({ id: 'stub-formatter' });
      expect(provisioner.provision).toHaveBeenCalledTimes(2);
    });

    it('should stop only the aborted caller from waiting', async () => {
      const provisioner = new StubProvisioner();
      const gate = new Deferred<ProvisionedAgent>();
      provisioner.results.push(() => gate.promise);
      const registry = new AgentRegistry(provisioner);
      const controller = new AbortController();

      const aborted = registry.resolve('formatter', controller.signal);
      const patient = registry.resolve('formatter');
      controller.abort();

      expect(await captureRejection(aborted)).toBeInstanceOf(CancelledError);
      gate.resolve({ id: 'stub-late', reused: false });
      await expect(patient).resolves.toMatchObject({ id: 'stub-late' });
      expect(registry.list().map((descriptor) => descriptor.id)).toEqual(['stub-late']);
    });
  });

  describe('teardown', () => {
    it('should release and forget one agent', async () => {
      const provisioner = new StubProvisioner();
      const registry = new AgentRegistry(provisioner);
      await registry.resolve('formatter');

      expect(registry.has('stub-formatter')).toBe(true);
      await expect(registry.teardown('stub-formatter')).resolves.toBe(true);

      expect(provisioner.release).toHaveBeenCalledWith('stub-formatter');
      expect(registry.has('stub-formatter')).toBe(false);
      expect(registry.list()).toEqual([]);
    });

    it('should report unknown ids', async () => {
      const registry = new AgentRegistry(new StubProvisioner());
      await expect(registry.teardown('missing')).resolves.toBe(false);
    });

    it('should re-provision a role after teardown', async () => {
      const provisioner = new StubProvisioner();
      const registry = new AgentRegistry(provisioner);
      const first = await registry.resolve('formatter');
      await registry.teardown(first.id);

      const second = await registry.resolve('formatter');

      expect(second).not.toBe(first);
      expect(provisioner.provision).toHaveBeenCalledTimes(2);
    });
  });

  describe('teardownAll', () => {
    it('should release every agent', async () => {
      const provisioner = new StubProvisioner();
      const registry = new AgentRegistry(provisioner);
      await registry.resolve('code-analyzer');
      await registry.resolve('formatter');

      await registry.teardownAll();

      expect(provisioner.release).toHaveBeenCalledTimes(2);
      expect(registry.list()).toEqual([]);
    });

    it('should attempt every release before reporting failures', async () => {
      const provisioner = new StubProvisioner();
      provisioner.release.mockRejectedValueOnce(new Error('release failed'));
      const registry = new AgentRegistry(provisioner);
      await registry.resolve('code-analyzer');
      await registry.resolve('formatter');

      const error = await captureRejection(registry.teardownAll());

      expect(error).toBeInstanceOf(AggregateError);
      expect(error).toMatchObject({ message: 'Failed to tear down 1 agent(s)' });
      expect(provisioner.release).toHaveBeenCalledTimes(2);
      expect(registry.list()).toHaveLength(1);
    });
  });
});

describe('RemoteAgentProvisioner', () => {
  it('should reuse a remote agent with the role name', async () => {
    const client = new FakeAgentsClient();
    client.agents.push({ id: 'asst_existing', name: 'CodeAnalyzerAgent', model: 'docs-model' });
    const registry = new AgentRegistry(new RemoteAgentProvisioner(client, 'docs-model'));

    const descriptor = await registry.resolve('code-analyzer');

    expect(descriptor).toMatchObject({ id: 'asst_existing', mode: 'managed', reused: true });
    expect(client.createAgent).not.toHaveBeenCalled();
  });

  it('should register a missing agent with its instructions', async () => {
    const client = new FakeAgentsClient();
    const registry = new AgentRegistry(new RemoteAgentProvisioner(client, 'docs-model'));

    const descriptor = await registry.resolve('doc-generator');

    expect(descriptor).toMatchObject({ id: 'asst_1', reused: false });
    expect(client.createAgent).toHaveBeenCalledWith({
      name: 'DocGeneratorAgent',
      model: 'docs-model',
      instructions: generateInstructions('doc-generator'),
      metadata: { role: 'doc-generator', capabilities: 'generate,brd,frd,nfrd,security,architecture' },
    });
  });

  it('should delete the remote agent on teardown', async () => {
    const client = new FakeAgentsClient();
    const registry = new AgentRegistry(new RemoteAgentProvisioner(client, 'docs-model'));
    const descriptor = await registry.resolve('formatter');

    await registry.teardown(descriptor.id);

    expect(client.deleteAgent).toHaveBeenCalledWith('asst_1');
    expect(client.agents).toEqual([]);
  });
});
