// engine/contract/schema.ts — Contract file document: zod schema and model conversion

import { z } from 'zod';
import { HTTP_METHODS } from '../types.js';
import type { Contract, Endpoint, EndpointParameter, ModelDef, ResponseSpec } from '../types.js';
import { ContractFormatError } from '../errors.js';
import { endpointKey, endpointId } from './paths.js';

// ─── Document Schema ────────────────────────────────────────────────────────
// Files use snake_case keys; optional keys may be absent or null.

const timestamp = z.union([z.string(), z.date().transform((d) => d.toISOString())]);

const ParameterDocSchema = z.object({
  name: z.string().min(1),
  type: z.string().optional(),
  required: z.boolean().default(true),
});

const ResponseDocSchema = z
  .object({
    status: z.number().int().optional(),
    type: z.string().optional(),
    schema: z.string().optional(),
    items: z.string().optional(),
  })
  .passthrough();

export const EndpointDocSchema = z.object({
  id: z.string().nullish(),
  path: z.string().min(1),
  method: z
    .string()
    .transform((m) => m.toUpperCase())
    .pipe(z.enum(HTTP_METHODS)),
  status: z.enum(['implemented', 'deprecated', 'planned']).default('implemented'),
  implemented_at: timestamp.nullish(),
  source_file: z.string().nullish(),
  function_name: z.string().nullish(),
  parameters: z.array(ParameterDocSchema).nullish(),
  response: ResponseDocSchema.nullish(),
  consumers: z.array(z.string()).nullish(),
});

const ModelDocSchema = z.object({
  fields: z
    .array(z.object({ name: z.string(), type: z.string().default('unknown') }))
    .nullish(),
});

export const ContractDocSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  repo_id: z.string().nullish(),
  role: z.enum(['provider', 'consumer', 'both']).default('provider'),
  last_updated: timestamp,
  endpoints: z.array(EndpointDocSchema).nullish(),
  models: z.record(ModelDocSchema).nullish(),
});

export type EndpointDocument = {
  id: string;
  path: string;
  method: string;
  status: string;
  implemented_at: string | null;
  source_file: string | null;
  function_name: string | null;
  parameters: EndpointParameter[];
  response: ResponseSpec;
  consumers: string[];
};

export type ContractDocument = {
  version: string;
  repo_id: string;
  role: string;
  last_updated: string;
  endpoints: EndpointDocument[];
  models: Record<string, ModelDef>;
};

// ─── Conversion ─────────────────────────────────────────────────────────────

/**
 * Validate a raw document (as produced by a YAML/JSON loader) and convert it
 * to a Contract. Rejects documents that list the same (method, path) twice.
 *
 * @throws {ContractFormatError}
 */
export function parseContract(raw: unknown, file: string | null = null): Contract {
  const parsed = ContractDocSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ContractFormatError(`Invalid contract document: ${details}`, file);
  }

  const doc = parsed.data;
  const endpoints: Endpoint[] = [];
  const seen = new Set<string>();

  for (const ep of doc.endpoints ?? []) {
    const key = endpointKey(ep.method, ep.path);
    if (seen.has(key)) {
      throw new ContractFormatError(`Invalid contract document: duplicate endpoint ${key}`, file);
    }
    seen.add(key);

    endpoints.push({
      id: ep.id ?? endpointId(ep.method, ep.path),
      path: ep.path,
      method: ep.method,
      status: ep.status,
      implementedAt: ep.implemented_at ?? null,
      sourceFile: ep.source_file ?? null,
      functionName: ep.function_name ?? null,
      parameters: (ep.parameters ?? []).map(toParameter),
      response: ep.response ?? {},
      consumers: ep.consumers ?? [],
    });
  }

  const models: Record<string, ModelDef> = {};
  for (const [name, model] of Object.entries(doc.models ?? {})) {
    models[name] = { fields: model.fields ?? [] };
  }

  return {
    version: doc.version,
    repoId: doc.repo_id ?? '',
    role: doc.role,
    lastUpdated: doc.last_updated,
    endpoints,
    models,
  };
}

/**
 * Convert a Contract to its file document. Absent optional values are left
 * out rather than written as undefined.
 */
export function contractToDocument(contract: Contract): ContractDocument {
  return {
    version: contract.version,
    repo_id: contract.repoId,
    role: contract.role,
    last_updated: contract.lastUpdated,
    endpoints: contract.endpoints.map((ep) => ({
      id: ep.id,
      path: ep.path,
      method: ep.method,
      status: ep.status,
      implemented_at: ep.implementedAt,
      source_file: ep.sourceFile,
      function_name: ep.functionName,
      parameters: ep.parameters.map(toParameter),
      response: dropUndefined(ep.response),
      consumers: [...ep.consumers],
    })),
    models: Object.fromEntries(
      Object.entries(contract.models).map(([name, model]) => [
        name,
        { fields: model.fields.map((f) => ({ name: f.name, type: f.type })) },
      ]),
    ),
  };
}

function toParameter(p: { name: string; type?: string; required: boolean }): EndpointParameter {
  return p.type === undefined
    ? { name: p.name, required: p.required }
    : { name: p.name, type: p.type, required: p.required };
}

function dropUndefined(response: ResponseSpec): ResponseSpec {
  const out: ResponseSpec = {};
  for (const [key, value] of Object.entries(response)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
