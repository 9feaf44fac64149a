export * from './board.js';

export { ReferencePosition, STARTING_FEN } from './reference-position.js';
export type { MoveResult } from './reference-position.js';

export { auditReplay } from './replay-audit.js';
export type { AuditFinding, AuditFindingKind, AuditReport } from './replay-audit.js';

export { renderBoard, formatPositionForPrompt } from './board-visualizer.js';
export type { Perspective, BoardRenderOptions, PromptFormatOptions } from './board-visualizer.js';
