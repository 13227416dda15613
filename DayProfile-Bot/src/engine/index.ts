export type { CalendricalEngine } from './types.js';
export { ReferenceEngine } from './reference-engine.js';
export { loadInterpretationTables, type InterpretationTables } from './interpretation.js';
