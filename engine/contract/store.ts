// engine/contract/store.ts — Contract persistence: YAML read/write with atomic replace

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import * as yaml from 'js-yaml';
import type { Contract } from '../types.js';
import { ContractFormatError, errorMessage } from '../errors.js';
import { contractToDocument, parseContract } from './schema.js';

/**
 * Parse YAML text into a plain document. The core schema keeps ISO-8601
 * timestamps as strings so they round-trip byte for byte.
 *
 * @throws {ContractFormatError}
 */
export function parseYaml(text: string, file: string | null = null): unknown {
  try {
    return yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: file ?? undefined });
  } catch (err) {
    throw new ContractFormatError(`Invalid YAML: ${errorMessage(err)}`, file, { cause: err });
  }
}

export function dumpYaml(doc: object): string {
  return yaml.dump(doc, { noRefs: true, lineWidth: -1, sortKeys: false });
}

export function readContractText(text: string, file: string | null = null): Contract {
  return parseContract(withVersionText(parseYaml(text, file), text, file), file);
}

/**
 * An unquoted `version: 1.0` resolves to the number 1. Read the scalar's
 * source text instead so the version survives a load/save cycle.
 */
function withVersionText(doc: unknown, text: string, file: string | null): unknown {
  if (!isPlainObject(doc) || typeof doc.version !== 'number') return doc;
  const raw = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA, filename: file ?? undefined });
  return isPlainObject(raw) && typeof raw.version === 'string' ? { ...doc, version: raw.version } : doc;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a contract from a YAML (or JSON, which is valid YAML) file.
 *
 * @throws {ContractFormatError} when the file is unreadable or malformed
 */
export function loadContract(file: string): Contract {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ContractFormatError(`Cannot read contract: ${errorMessage(err)}`, file, { cause: err });
  }
  return readContractText(text, file);
}

/**
 * Load a contract, or null when the file is absent or unusable.
 */
export function tryLoadContract(file: string): Contract | null {
  if (!fs.existsSync(file)) return null;
  try {
    return loadContract(file);
  } catch {
    return null;
  }
}

export function saveContract(contract: Contract, file: string): string {
  writeFileAtomic(file, dumpYaml(contractToDocument(contract)));
  return file;
}

/**
 * Write to a sibling temp file, then rename over the destination so readers
 * never observe a half-written file. Parent directories are created.
 */
export function writeFileAtomic(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
  try {
    fs.writeFileSync(tmp, content, 'utf-8');
    fs.renameSync(tmp, file);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}
