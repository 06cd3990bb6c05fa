export { HttpBusinessRegistryClient, createRegistryClientFromEnv, parseRegistryEntity } from './HttpBusinessRegistryClient.js';
export { normalizeVatNumber } from './types.js';
export type { BusinessRegistryLookup, RegistryEntity, RegistryLookupResult } from './types.js';
