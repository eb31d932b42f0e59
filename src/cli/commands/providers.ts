/**
 * Provider configuration commands.
 *
 * @module cli/commands/providers
 */

import { describeCredentials, parseCredentials } from '../../config/credentials.js';
import type { CliContext } from '../context.js';

export interface AddScalewayOptions {
  name: string;
  accessKey: string;
  secretKey: string;
  region: string;
  bucket: string;
  organizationId: string;
  projectId: string;
}

export interface AddExoscaleOptions {
  name: string;
  apiKey: string;
  apiSecret: string;
  zone: string;
  bucket: string;
}

async function saveProvider(ctx: CliContext, name: string, input: unknown): Promise<void> {
  const credentials = parseCredentials(input);
  const registry = await ctx.store.load();
  registry.put(name, credentials);
  await ctx.store.save(registry);

  ctx.output.out(`Provider '${name}' added successfully.`);
  ctx.output.out(`Config saved to: ${ctx.store.path}`);
}

export async function addScalewayProvider(
  ctx: CliContext,
  options: AddScalewayOptions
): Promise<void> {
  const { name, ...fields } = options;
  await saveProvider(ctx, name, { type: 'scaleway', ...fields });
}

export async function addExoscaleProvider(
  ctx: CliContext,
  options: AddExoscaleOptions
): Promise<void> {
  const { name, ...fields } = options;
  await saveProvider(ctx, name, { type: 'exoscale', ...fields });
}

export async function listProviders(ctx: CliContext): Promise<void> {
  const registry = await ctx.store.load();
  if (registry.size === 0) {
    ctx.output.out('No providers configured.');
    ctx.output.out('Add one with: bucketward add-provider --help');
    return;
  }

  ctx.output.out('Configured providers:');
  for (const name of registry.list()) {
    const credentials = registry.get(name);
    if (credentials) {
      ctx.output.out(`  - ${name} [${describeCredentials(credentials)}]`);
    }
  }
}

export async function removeProvider(ctx: CliContext, name: string): Promise<void> {
  const registry = await ctx.store.load();
  if (!registry.remove(name)) {
    ctx.output.out(`Provider '${name}' not found.`);
    return;
  }
  await ctx.store.save(registry);
  ctx.output.out(`Provider '${name}' removed.`);
}

export function printConfigPath(ctx: CliContext): void {
  ctx.output.out(ctx.store.path);
}
