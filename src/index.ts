#!/usr/bin/env node

/**
 * docweave - CLI Entry Point
 * Generate BRD/FRD/NFRD/Security/Architecture documents for a codebase
 */

import * as dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { version } from '../package.json';
import { OUTPUT_FORMATS, DOCUMENT_TYPES } from './types/artifact.types.js';
import { ConfigError } from './types/error.types.js';
import type { RunEvent, RunEventType, RunOutcome } from './types/run.types.js';
import {
  displayAgents,
  displayBanner,
  displayError,
  displayInfo,
  displayOutcome,
  displayProbe,
  displayRemoteAgents,
  formatEvent,
} from './cli/output.js';
import { createDocweave, type Docweave } from './setup.js';
import { loadConfig } from '@utils/config';
import { createModuleLogger } from '@utils/logger';

dotenv.config();

const logger = createModuleLogger('main');

const EXIT_CODES: Record<RunOutcome['status'], number> = {
  done: 0,
  partial: 2,
  failed: 1,
  cancelled: 130,
};

const PROGRESS_EVENTS: RunEventType[] = ['stage:started', 'stage:retry', 'stage:completed', 'stage:failed'];

function bootstrap(): Docweave {
  return createDocweave(loadConfig());
}

/**
 * Write inline outputs under <outputDir>/<runId>/; returns format → file URI
 */
async function writeOutputs(app: Docweave, outcome: RunOutcome): Promise<Map<string, string>> {
  const written = new Map<string, string>();
  if (outcome.status !== 'done' && outcome.status !== 'partial') {
    return written;
  }

  for (const output of Object.values(outcome.package.outputs)) {
    if (output?.payload.content.type === 'inline') {
      const { fileName, mediaType, content, format } = output.payload;
      written.set(format, await app.store.put(`${outcome.runId}/${fileName}`, content.bytes, mediaType));
    }
  }
  return written;
}

interface RunArgs {
  source: string;
  format: string[];
  doc: string[] | undefined;
  title: string | undefined;
  prompt: string | undefined;
  upload: boolean;
}

async function handleRun(args: RunArgs): Promise<void> {
  const app = bootstrap();
  const controller = new AbortController();

  process.once('SIGINT', () => {
    logger.info('Received SIGINT, cancelling run');
    controller.abort();
  });

  const printEvent = (event: RunEvent): void => {
    console.log(formatEvent(event));
  };
  for (const eventType of PROGRESS_EVENTS) {
    app.orchestrator.on(eventType, printEvent);
  }

  displayInfo(`Documenting ${args.source} → ${args.format.join(', ')}`);

  const outcome = await app.orchestrator.run(
    {
      source: args.source,
      formats: args.format,
      options: {
        documentTypes: args.doc,
        title: args.title,
        prompt: args.prompt,
        upload: args.upload,
      },
    },
    { signal: controller.signal }
  );

  const written = await writeOutputs(app, outcome);
  displayOutcome(outcome, written);
  displayAgents(app.orchestrator.listAgents());
  process.exitCode = EXIT_CODES[outcome.status];
}

async function handleProbe(): Promise<void> {
  const app = bootstrap();
  displayProbe(await app.probe.detect());
}

async function handleAgentsList(): Promise<void> {
  const app = bootstrap();
  if (!app.client) {
    displayInfo('No managed runtime configured (set AGENTS_ENDPOINT and AGENTS_API_KEY)');
    return;
  }
  displayRemoteAgents(await app.client.listAgents());
}

async function handleAgentsDelete(agentId: string): Promise<void> {
  const app = bootstrap();
  if (await app.orchestrator.teardownAgent(agentId)) {
    displayInfo(`Agent ${agentId} torn down`);
    return;
  }
  if (!app.client) {
    displayError('Cannot delete agent', 'No managed runtime configured');
    process.exitCode = 1;
    return;
  }
  await app.client.deleteAgent(agentId);
  displayInfo(`Remote agent ${agentId} deleted`);
}

async function main(): Promise<void> {
  displayBanner(version);

  await yargs(hideBin(process.argv))
    .scriptName('docweave')
    .version(version)
    .command(
      'run <source>',
      'Analyze a codebase and render its documentation package',
      (command) =>
        command
          .positional('source', { type: 'string', demandOption: true, describe: 'codebase directory' })
          .option('format', {
            alias: 'f',
            type: 'string',
            array: true,
            demandOption: true,
            describe: `output formats (${OUTPUT_FORMATS.join('|')})`,
          })
          .option('doc', { alias: 'd', type: 'string', array: true, describe: `document types (${DOCUMENT_TYPES.join('|')})` })
          .option('title', { type: 'string' })
          .option('prompt', { type: 'string', describe: 'free-form request passed to the agents' })
          .option('upload', { type: 'boolean', default: false, describe: 'store outputs and return references' }),
      (argv) =>
        handleRun({
          source: argv.source,
          format: argv.format,
          doc: argv.doc,
          title: argv.title,
          prompt: argv.prompt,
          upload: argv.upload,
        })
    )
    .command('probe', 'Report which execution mode a run would use', {}, () => handleProbe())
    .command('agents <action> [id]', 'List or delete agents', (command) =>
      command
        .positional('action', { choices: ['list', 'delete'] as const, demandOption: true })
        .positional('id', { type: 'string' }),
      async (argv) => {
        if (argv.action === 'list') {
          await handleAgentsList();
        } else if (argv.id) {
          await handleAgentsDelete(argv.id);
        } else {
          displayError('Missing agent id', 'Usage: docweave agents delete <id>');
          process.exitCode = 1;
        }
      }
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .parseAsync();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    displayError('Configuration error', error.message);
  } else {
    logger.fatal({ error }, 'Fatal error');
    displayError('Fatal error', error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
