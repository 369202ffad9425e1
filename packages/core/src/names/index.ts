export { normalizeForMatch } from './normalize.js';
export { compileAliasTable, resolvePartyShort, fallbackShorten } from './resolve.js';
export type { CompiledAlias, CompiledAliasTable } from './resolve.js';
