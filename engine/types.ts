// engine/types.ts — Core type definitions for contract-bridge

// --- Contract ---
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export type EndpointStatus = 'implemented' | 'deprecated' | 'planned';

export type ContractRole = 'provider' | 'consumer' | 'both';

export interface EndpointParameter {
  name: string;
  type?: string;
  required: boolean;
}

export interface ResponseSpec {
  status?: number;
  type?: string;
  schema?: string;
  items?: string;
  [key: string]: unknown;
}

export interface Endpoint {
  id: string;
  path: string;
  method: HttpMethod;
  status: EndpointStatus;
  implementedAt: string | null;
  sourceFile: string | null;
  functionName: string | null;
  parameters: EndpointParameter[];
  response: ResponseSpec;
  /** Consumer identifiers; order carries no meaning. */
  consumers: string[];
}

export interface ModelField {
  name: string;
  type: string;
}

export interface ModelDef {
  fields: ModelField[];
}

export interface Contract {
  version: string;
  repoId: string;
  role: ContractRole;
  lastUpdated: string;
  endpoints: Endpoint[];
  models: Record<string, ModelDef>;
}

export interface ContractDiff {
  added: Endpoint[];
  removed: Endpoint[];
  modified: Endpoint[];
}

// --- Configuration ---
export type SyncMethod = 'git' | 'http' | 's3';

export interface Dependency {
  name: string;
  /** Kind of API surface, e.g. "http-api". */
  type: string;
  syncMethod: SyncMethod;
  gitUrl: string | null;
  /** Contract location inside the provider repository. */
  contractPath: string;
  /** Cache location inside the consumer repository. */
  localCache: string;
  syncOnCommit: boolean;
}

export interface ProviderSettings {
  contractFile: string;
  extractFrom: string[];
  autoUpdate: boolean;
}

export interface BridgeConfig {
  enabled: boolean;
  role: ContractRole;
  repoId: string;
  provides: ProviderSettings | null;
  dependencies: Record<string, Dependency>;
  /** Absolute root that every relative path in the registry resolves against. */
  repoRoot: string;
  configPath: string;
  contractsDir: string;
  sync: {
    maxConcurrency: number;
    /** Unset means the fetch may run as long as it needs. */
    fetchTimeoutMs?: number;
  };
}

// --- Sync ---
export type SyncProgressStatus = 'starting' | 'completed' | 'failed';

export type SyncProgressCallback = (dependencyName: string, status: SyncProgressStatus) => void;

export interface SyncResult {
  dependencyName: string;
  success: boolean;
  changes: string[];
  errors: string[];
  endpointCount: number;
  cachedFile: string | null;
  timestamp: string;
}

export interface ConsumerExpectation {
  /** "METHOD /path" as called by the consumer. */
  endpoint: string;
  status: 'using';
  usageLocations: string[];
}

export interface ConsumerExpectations {
  dependency: string;
  lastUpdated: string;
  expectations: ConsumerExpectation[];
}

// --- Findings ---
export type Severity = 'error' | 'warning' | 'info';

export type DriftIssueType =
  | 'configuration_error'
  | 'missing_contract'
  | 'invalid_contract'
  | 'missing_endpoint';

export interface DriftIssue {
  type: DriftIssueType;
  severity: Extract<Severity, 'error' | 'warning'>;
  endpoint: string;
  method: string;
  /** "file:line", empty when the issue is not tied to a call site. */
  location: string;
  message: string;
  suggestion: string;
}

export interface DriftReport {
  dependencyName: string;
  totalIssues: number;
  errors: number;
  warnings: number;
  issues: DriftIssue[];
  success: boolean;
  message: string;
}

export type BreakingChangeType = 'endpoint_removed' | 'endpoint_modified' | 'unused_endpoint';

export interface BreakingChange {
  type: BreakingChangeType;
  severity: Severity;
  endpoint: string;
  method: HttpMethod;
  message: string;
  affectedConsumers: string[];
  suggestion: string;
}

// --- Scanner Output ---
export interface ApiCall {
  method: HttpMethod;
  path: string;
  /** Path relative to the scanned repository root. */
  file: string;
  line: number;
}
