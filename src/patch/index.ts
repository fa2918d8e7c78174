export { createPatch, applyPatches, patchDeclaration, type Patch, type PatchKind } from './patcher.js';
export { formatDocstringLiteral, type LiteralOptions } from './literal.js';
