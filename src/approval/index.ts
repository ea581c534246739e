// ============================================================================
// Approval Module — Barrel Export
// ============================================================================

export type {
  AmountSummary,
  AttachmentDescriptor,
  CategoryMap,
  ExtractedSummary,
  FieldRules,
  FormControl,
  FormDocument,
  ParseOutcome,
  WalkResult,
} from './types.js';
export type { EventDecision } from './event.js';
export type { ApprovalOutcome, NotificationSender, ProcessingStage, ProcessorDeps, SkipReason } from './processor.js';

// Pure functions
export { parseFormDocument } from './form-parser.js';
export { walkForm, walkFormText } from './form-walker.js';
export { resolveAttachmentControl, dedupeAttachments } from './attachment-resolver.js';
export { extractSummary, DEFAULT_FIELD_RULES } from './field-aggregator.js';
export { routeCategory, loadCategoryMap } from './category-router.js';
export { parseApprovalEvent } from './event.js';

// Orchestration
export { processApproval } from './processor.js';
