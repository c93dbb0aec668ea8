// engine/scanner/route-extractor.ts — Extracts route registrations and data models from provider source
import type { Endpoint, EndpointParameter, HttpMethod, ModelDef, ModelField, ResponseSpec } from '../types.js';
import { HTTP_METHODS } from '../types.js';
import { endpointId } from '../contract/paths.js';
import type { SourceLanguage, SyntaxNode } from './tree-sitter.js';
import { parseSource } from './tree-sitter.js';
import { firstPositionalArgument, readLiteral, significantChildren } from './syntax.js';

/** Objects whose `.get('/path', ...)`-style calls register routes. */
const ROUTE_RECEIVERS = new Set(['app', 'router', 'server']);

/** Base classes that mark a class as a data model. */
const MODEL_BASES = new Set(['BaseModel', 'SQLModel', 'Model']);

const METHODS = new Set<string>(HTTP_METHODS);

export interface FileExtraction {
  endpoints: Endpoint[];
  models: Record<string, ModelDef>;
}

/**
 * Extract endpoints and models from one source file.
 * Returns null when the file does not parse.
 *
 * @param file        repository-relative path, recorded as provenance
 * @param implementedAt timestamp stamped on every endpoint
 */
export function extractFromSource(
  source: string,
  file: string,
  language: SourceLanguage,
  implementedAt: string,
): FileExtraction | null {
  const root = parseSource(source, language);
  if (!root) return null;

  if (language === 'python') {
    return {
      endpoints: extractPythonRoutes(root, file, implementedAt),
      models: extractPythonModels(root),
    };
  }
  return {
    endpoints: extractScriptRoutes(root, file, implementedAt),
    models: extractScriptModels(root),
  };
}

// ─── Python (FastAPI-style decorators) ──────────────────────────────────────

function extractPythonRoutes(root: SyntaxNode, file: string, implementedAt: string): Endpoint[] {
  const results: Endpoint[] = [];

  for (const decorated of root.descendantsOfType('decorated_definition')) {
    const fn = decorated.childForFieldName('definition');
    if (!fn || fn.type !== 'function_definition') continue;

    for (const decorator of decorated.namedChildren) {
      if (decorator.type !== 'decorator') continue;
      const route = readRouteCall(significantChildren(decorator)[0], 'call', 'attribute', 'attribute');
      if (!route) continue;

      results.push(
        makeEndpoint(route.method, route.path, {
          file,
          implementedAt,
          functionName: fn.childForFieldName('name')?.text ?? null,
          parameters: pythonParameters(fn.childForFieldName('parameters')),
          response: responseFromAnnotation(fn.childForFieldName('return_type')?.text ?? null),
        }),
      );
      break;
    }
  }

  return results;
}

function pythonParameters(params: SyntaxNode | null): EndpointParameter[] {
  if (!params) return [];
  const results: EndpointParameter[] = [];

  for (const param of significantChildren(params)) {
    let name: string | undefined;
    let type: string | undefined;
    let required = true;

    switch (param.type) {
      case 'identifier':
        name = param.text;
        break;
      case 'typed_parameter': {
        const id = param.namedChildren.find((c) => c.type === 'identifier');
        name = id?.text;
        type = param.childForFieldName('type')?.text;
        break;
      }
      case 'default_parameter':
        name = param.childForFieldName('name')?.text;
        required = false;
        break;
      case 'typed_default_parameter':
        name = param.childForFieldName('name')?.text;
        type = param.childForFieldName('type')?.text;
        required = false;
        break;
      default:
        continue; // *args, **kwargs, separators
    }

    if (!name || name === 'self' || name === 'cls') continue;
    results.push(type === undefined ? { name, required } : { name, type, required });
  }

  return results;
}

function responseFromAnnotation(annotation: string | null): ResponseSpec {
  if (!annotation) return { status: 200, type: 'unknown' };
  const list = /^(?:typing\.)?(?:List|list|Sequence)\[(.+)\]$/.exec(annotation.trim());
  if (list) return { status: 200, type: 'array', items: list[1].trim() };
  return { status: 200, type: 'object', schema: annotation.trim() };
}

function extractPythonModels(root: SyntaxNode): Record<string, ModelDef> {
  const models: Record<string, ModelDef> = {};

  for (const cls of root.descendantsOfType('class_definition')) {
    const name = cls.childForFieldName('name')?.text;
    const bases = cls.childForFieldName('superclasses');
    if (!name || !bases) continue;
    if (!significantChildren(bases).some((b) => MODEL_BASES.has(lastSegment(b.text)))) continue;

    const fields: ModelField[] = [];
    const body = cls.childForFieldName('body');
    for (const stmt of body ? significantChildren(body) : []) {
      if (stmt.type !== 'expression_statement') continue;
      const assignment = stmt.namedChildren[0];
      if (!assignment || assignment.type !== 'assignment') continue;
      const left = assignment.childForFieldName('left');
      const type = assignment.childForFieldName('type');
      if (left?.type === 'identifier' && type) {
        fields.push({ name: left.text, type: type.text });
      }
    }

    models[name] = { fields };
  }

  return models;
}

// ─── TypeScript / JavaScript (Express/Hono-style registrations) ─────────────

function extractScriptRoutes(root: SyntaxNode, file: string, implementedAt: string): Endpoint[] {
  const results: Endpoint[] = [];

  for (const call of root.descendantsOfType('call_expression')) {
    const route = readRouteCall(call, 'call_expression', 'member_expression', 'property');
    if (!route) continue;

    const args = call.childForFieldName('arguments');
    const handlers = args ? significantChildren(args).slice(1) : [];
    const handler = handlers[handlers.length - 1];
    const functionName =
      handler && (handler.type === 'identifier' || handler.type === 'member_expression') ? handler.text : null;

    const { template, parameters } = expressPathToTemplate(route.path);
    results.push(
      makeEndpoint(route.method, template, {
        file,
        implementedAt,
        functionName,
        parameters,
        response: { status: 200, type: 'unknown' },
      }),
    );
  }

  return results;
}

/**
 * `/users/:id/posts/:postId?` → `/users/{id}/posts/{postId}` with one
 * parameter per placeholder; `{name}` placeholders are kept as they are.
 */
export function expressPathToTemplate(path: string): { template: string; parameters: EndpointParameter[] } {
  const parameters: EndpointParameter[] = [];
  const segments = path.split('/').map((segment) => {
    const express = /^:([A-Za-z_][\w]*)(\?)?$/.exec(segment);
    if (express) {
      parameters.push({ name: express[1], type: 'string', required: express[2] !== '?' });
      return `{${express[1]}}`;
    }
    const braced = /^\{([^}]+)\}$/.exec(segment);
    if (braced) parameters.push({ name: braced[1], type: 'string', required: true });
    return segment;
  });
  return { template: segments.join('/'), parameters };
}

function extractScriptModels(root: SyntaxNode): Record<string, ModelDef> {
  const models: Record<string, ModelDef> = {};
  const classes = [
    ...root.descendantsOfType('class_declaration'),
    ...root.descendantsOfType('abstract_class_declaration'),
  ];

  for (const cls of classes) {
    const name = cls.childForFieldName('name')?.text;
    const heritage = cls.namedChildren.find((c) => c.type === 'class_heritage');
    if (!name || !heritage) continue;

    // TypeScript wraps the base in extends_clause; JavaScript puts it directly under class_heritage
    const extendsClause = heritage.namedChildren.find((c) => c.type === 'extends_clause') ?? heritage;
    const base = extendsClause.childForFieldName('value') ?? significantChildren(extendsClause)[0];
    if (!base || !MODEL_BASES.has(lastSegment(base.text))) continue;

    const fields: ModelField[] = [];
    const body = cls.childForFieldName('body');
    for (const member of body ? significantChildren(body) : []) {
      if (member.type !== 'public_field_definition' && member.type !== 'field_definition') continue;
      const fieldName = member.childForFieldName('name') ?? member.childForFieldName('property');
      if (!fieldName) continue;
      const annotation = member.childForFieldName('type');
      fields.push({
        name: fieldName.text,
        type: annotation ? annotation.text.replace(/^:\s*/, '') : 'unknown',
      });
    }

    models[name] = { fields };
  }

  return models;
}

// ─── Shared ─────────────────────────────────────────────────────────────────

/**
 * Match `<receiver>.<verb>(<literal path>, ...)` for the given grammar's
 * call / member-access node types.
 */
function readRouteCall(
  node: SyntaxNode | undefined,
  callType: string,
  memberType: string,
  propertyField: string,
): { method: HttpMethod; path: string } | null {
  if (!node || node.type !== callType) return null;

  const fn = node.childForFieldName('function');
  if (!fn || fn.type !== memberType) return null;

  const receiver = fn.childForFieldName('object');
  if (!receiver || receiver.type !== 'identifier' || !ROUTE_RECEIVERS.has(receiver.text)) return null;

  const method = toHttpMethod(fn.childForFieldName(propertyField)?.text);
  if (!method) return null;

  const pathArg = firstPositionalArgument(node.childForFieldName('arguments'));
  const path = pathArg ? readLiteral(pathArg) : null;
  if (!path) return null;

  return { method, path };
}

export function toHttpMethod(name: string | undefined): HttpMethod | null {
  if (!name) return null;
  const upper = name.toUpperCase();
  return isHttpMethod(upper) ? upper : null;
}

function isHttpMethod(value: string): value is HttpMethod {
  return METHODS.has(value);
}

function lastSegment(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

function makeEndpoint(
  method: HttpMethod,
  path: string,
  details: {
    file: string;
    implementedAt: string;
    functionName: string | null;
    parameters: EndpointParameter[];
    response: ResponseSpec;
  },
): Endpoint {
  return {
    id: endpointId(method, path),
    path,
    method,
    status: 'implemented',
    implementedAt: details.implementedAt,
    sourceFile: details.file,
    functionName: details.functionName,
    parameters: details.parameters,
    response: details.response,
    consumers: [],
  };
}
