/**
 * CLI program definition.
 *
 * @module cli/program
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { CliContext, type CliDependencies, type GlobalOptions } from './context.js';
import { createApp, deleteApp, listApps, type CreateAppOptions } from './commands/apps.js';
import {
  addExoscaleProvider,
  addScalewayProvider,
  listProviders,
  printConfigPath,
  removeProvider,
  type AddExoscaleOptions,
  type AddScalewayOptions,
} from './commands/providers.js';

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const content = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  return packageSchema.parse(JSON.parse(content)).version;
}

export function createProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('bucketward')
    .description('Provision bucket-scoped S3 credentials for applications')
    .version(readVersion())
    .option('-c, --config <path>', 'path to config file (default: OS config directory)');

  const context = (): CliContext => new CliContext(deps, program.opts<GlobalOptions>());

  const addProvider = program
    .command('add-provider')
    .description('Add a new provider configuration');

  addProvider
    .command('scaleway')
    .description('Add a Scaleway provider')
    .requiredOption('-n, --name <name>', 'provider name (your choice, e.g. "my-scaleway")')
    .requiredOption('--access-key <key>', 'access key')
    .requiredOption('--secret-key <key>', 'secret key')
    .requiredOption('--region <region>', 'region (e.g. fr-par, nl-ams, pl-waw)')
    .requiredOption('--bucket <bucket>', 'bucket name')
    .requiredOption('--organization-id <id>', 'organization ID')
    .requiredOption('--project-id <id>', 'project ID')
    .action((options: AddScalewayOptions) => addScalewayProvider(context(), options));

  addProvider
    .command('exoscale')
    .description('Add an Exoscale provider')
    .requiredOption('-n, --name <name>', 'provider name (your choice, e.g. "my-exoscale")')
    .requiredOption('--api-key <key>', 'API key')
    .requiredOption('--api-secret <secret>', 'API secret')
    .requiredOption('--zone <zone>', 'zone (e.g. ch-gva-2, de-fra-1, ch-dk-2)')
    .requiredOption('--bucket <bucket>', 'bucket name')
    .action((options: AddExoscaleOptions) => addExoscaleProvider(context(), options));

  program
    .command('list-providers')
    .description('List configured providers')
    .action(() => listProviders(context()));

  program
    .command('remove-provider')
    .description('Remove a provider configuration')
    .requiredOption('-n, --name <name>', 'provider name to remove')
    .action((options: { name: string }) => removeProvider(context(), options.name));

  program
    .command('config-path')
    .description('Show config file path')
    .action(() => printConfigPath(context()));

  program
    .command('create-app')
    .description('Create credentials for a new app')
    .requiredOption('-p, --provider <name>', 'provider name (from config)')
    .requiredOption('-n, --name <name>', 'app name')
    .requiredOption('-d, --description <text>', 'app description')
    .action((options: CreateAppOptions) => createApp(context(), options));

  program
    .command('list-apps')
    .description('List existing apps')
    .requiredOption('-p, --provider <name>', 'provider name (from config)')
    .action((options: { provider: string }) => listApps(context(), options.provider));

  program
    .command('delete-app')
    .description('Delete an app and its credentials')
    .requiredOption('-p, --provider <name>', 'provider name (from config)')
    .requiredOption('-a, --app-id <id>', 'app ID to delete')
    .action((options: { provider: string; appId: string }) =>
      deleteApp(context(), options.provider, options.appId)
    );

  return program;
}
