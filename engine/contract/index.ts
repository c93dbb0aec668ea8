// engine/contract/index.ts — Contract model barrel

export { PARAM_TOKEN, normalizePath, pathsMatch, endpointKey, endpointId, splitSegments } from './paths.js';
export { parseContract, contractToDocument } from './schema.js';
export type { ContractDocument, EndpointDocument } from './schema.js';
export {
  parseYaml,
  dumpYaml,
  readContractText,
  loadContract,
  tryLoadContract,
  saveContract,
  writeFileAtomic,
} from './store.js';
export {
  DIFF_IGNORED_FIELDS,
  BREAKING_IGNORED_FIELDS,
  indexEndpoints,
  endpointsDiffer,
  compareContracts,
  hasChanges,
  describeDiff,
} from './diff.js';
