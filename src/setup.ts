/**
 * Wires the default collaborators, workers and orchestrator from configuration
 */

import { FileSystemAnalyzer } from './collaborators/filesystem-analyzer.js';
import { LocalDirectoryStore } from './collaborators/local-store.js';
import { createDefaultRenderers } from './collaborators/renderers.js';
import { TemplateDocumentGenerator } from './collaborators/template-generator.js';
import { createAgentsClient, type RemoteAgentsClient } from './remote/agents-client.js';
import { FallbackWorkerFactory, ManagedWorkerFactory } from './workers/worker-factory.js';
import { CapabilityProbe } from '@core/capability-probe';
import { Orchestrator } from '@core/orchestrator';
import { retryPolicyFromConfig } from '@core/retry';
import { DEFAULT_MODEL_DEPLOYMENT, type Config } from '@utils/config';

export interface Docweave {
  orchestrator: Orchestrator;
  probe: CapabilityProbe;
  client: RemoteAgentsClient | undefined;
  store: LocalDirectoryStore;
}

export function createDocweave(config: Config): Docweave {
  const client = createAgentsClient(config);
  const renderers = createDefaultRenderers();
  const store = new LocalDirectoryStore(config.outputDir);
  const probe = new CapabilityProbe(config, client);

  const managed = client
    ? new ManagedWorkerFactory({
        client,
        modelDeployment: config.modelDeployment ?? DEFAULT_MODEL_DEPLOYMENT,
        renderers,
        store,
      })
    : undefined;

  const fallback = new FallbackWorkerFactory({
    analyzer: new FileSystemAnalyzer(),
    generator: new TemplateDocumentGenerator(),
    renderers,
    store,
  });

  const orchestrator = new Orchestrator({
    probe,
    factories: { managed, fallback },
    retry: retryPolicyFromConfig(config),
    maxConcurrentFormats: config.maxConcurrentFormats,
  });

  return { orchestrator, probe, client, store };
}
