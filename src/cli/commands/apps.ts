/**
 * Application commands.
 *
 * @module cli/commands/apps
 */

import { formatCredentialBundle } from '../../orchestrator/index.js';
import type { CliContext } from '../context.js';
import { progressObserver } from '../output.js';

export interface CreateAppOptions {
  provider: string;
  name: string;
  description: string;
}

export async function createApp(ctx: CliContext, options: CreateAppOptions): Promise<void> {
  const { output } = ctx;
  const orchestrator = await ctx.orchestrator(options.provider, progressObserver(output));

  output.out(`Creating app '${options.name}' with provider '${options.provider}'...`);
  const result = await orchestrator.provision({
    name: options.name,
    description: options.description,
  });
  const { credentials } = result;
  const scope = credentials.prefix.endsWith('/') ? credentials.prefix : `${credentials.prefix}/`;

  output.out();
  output.out('=== App Created Successfully ===');
  output.out();
  output.out(`S3 Credentials for '${result.appName}':`);
  output.out();
  output.out(formatCredentialBundle(credentials));
  output.out();
  output.out('IMPORTANT: Save the secret_key now - it cannot be retrieved later!');
  output.out();
  output.out(`App ID: ${result.principal.id} (save this to delete the app later)`);
  output.out();
  output.out(`This app can ONLY access: s3://${credentials.bucket}/${scope}`);
}

export async function listApps(ctx: CliContext, provider: string): Promise<void> {
  const { output } = ctx;
  const orchestrator = await ctx.orchestrator(provider);

  const apps = await orchestrator.listApps();
  if (apps.length === 0) {
    output.out('No apps found.');
    return;
  }

  output.out('Apps:');
  for (const app of apps) {
    output.out(`  - ${app.name} (ID: ${app.id})`);
    if (app.description) {
      output.out(`    ${app.description}`);
    }
  }
}

export async function deleteApp(ctx: CliContext, provider: string, appId: string): Promise<void> {
  const { output } = ctx;
  const orchestrator = await ctx.orchestrator(provider, progressObserver(output));

  output.out(`Deleting app ${appId}...`);
  const report = await orchestrator.deleteApp(appId);

  for (const failed of report.failedKeys) {
    output.err(`Warning: could not delete API key ${failed.accessKey}: ${failed.error}`);
  }
  output.out('App deleted successfully.');
  if (report.staleBucketPolicy) {
    output.out();
    output.out(
      `Note: the bucket policy of '${report.staleBucketPolicy}' may still hold a statement for this app; remove it manually.`
    );
  }
}
