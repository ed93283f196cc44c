/**
 * Text Formats
 *
 * Conversions between graphs and the text an agent writes or reads.
 */

export { exportJson, type GraphDocument, graphDocumentSchema, parseJson } from './json';
export { parseKnowledge, removeComment } from './knowledge';
export { DEFAULT_RELATION, exportMermaid, type MermaidDiagram, parseMermaid } from './mermaid';
export type { Fact } from './types';
