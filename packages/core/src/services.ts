/**
 * High-level service operations behind each CLI command.
 * Ties together the credential manager, the code generator, and the local service index.
 */

import { CredentialManager, assertServiceName } from './credentials/manager.js';
import { normalizeSecret } from './credentials/secret-input.js';
import { configurationError } from './errors.js';
import type { CodeGenerator } from './generator/types.js';
import type { LocalStore } from './storage/sqlite.js';

export interface TotpContext {
  credentials: CredentialManager;
  generator: CodeGenerator;
  store: LocalStore;
}

export interface ServiceSummary {
  name: string;
  createdAt: string;
  updatedAt: string;
}

export interface GenerateResult {
  service: string;
  code: string;
  generator: string;
}

export async function addService(ctx: TotpContext, service: string, secret: string): Promise<{ service: string }> {
  const name = assertServiceName(service);
  const value = normalizeSecret(secret);

  if ((await ctx.credentials.retrieve(name)) !== null) {
    throw configurationError(`Service "${name}" already exists; use update instead.`, 'SERVICE_EXISTS', {
      service: name,
    });
  }

  await ctx.credentials.store(name, value);
  ctx.store.recordService(name);
  ctx.store.logAudit('service_added', { service: name });
  return { service: name };
}

export async function updateService(ctx: TotpContext, service: string, secret: string): Promise<{ service: string }> {
  const name = assertServiceName(service);
  const value = normalizeSecret(secret);

  await ctx.credentials.require(name);
  await ctx.credentials.update(name, value);
  ctx.store.recordService(name);
  ctx.store.logAudit('service_updated', { service: name });
  return { service: name };
}

/**
 * Removes the keystore entry and the index row. A name that is only in the
 * index (its entry was deleted out from under us) is still cleaned up.
 */
export async function removeService(
  ctx: TotpContext,
  service: string,
): Promise<{ service: string; secretRemoved: boolean }> {
  const name = assertServiceName(service);
  const hasSecret = (await ctx.credentials.retrieve(name)) !== null;
  const indexed = ctx.store.getService(name) !== undefined;

  if (!hasSecret && !indexed) {
    throw configurationError(`Service "${name}" is not configured.`, 'SERVICE_NOT_FOUND', { service: name });
  }

  const secretRemoved = hasSecret ? await ctx.credentials.remove(name) : false;
  ctx.store.deleteService(name);
  ctx.store.logAudit('service_removed', { service: name });
  return { service: name, secretRemoved };
}

export async function generateCode(ctx: TotpContext, service: string): Promise<GenerateResult> {
  const name = assertServiceName(service);
  const secret = await ctx.credentials.require(name);
  const code = await ctx.generator.generate(secret);
  ctx.store.logAudit('code_generated', { service: name, generator: ctx.generator.name });
  return { service: name, code, generator: ctx.generator.name };
}

export function listServices(ctx: Pick<TotpContext, 'store'>): ServiceSummary[] {
  return ctx.store.listServices().map((s) => ({
    name: s.name,
    createdAt: s.created_at,
    updatedAt: s.updated_at,
  }));
}
