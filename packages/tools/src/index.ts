export { defineTool, defineDelegate, TransferArgsSchema } from "./define-tool.js";
export type { TransferArgs } from "./define-tool.js";
export { transferTo, escalateToHuman, transferBackToTriage } from "./delegate.js";
export {
  DocumentStore,
  DocumentNotFoundError,
  documentTools,
  SaveDocumentSchema,
  ReadDocumentSchema,
  ListDocumentsSchema,
} from "./documents.js";
export type { DocumentEntry } from "./documents.js";
export {
  projectTools,
  projectDataTools,
  renderPlan,
  safeProjectName,
  CreateProjectPlanSchema,
  ExecuteProjectTaskSchema,
  ReviewProjectQualitySchema,
  SaveProjectDataSchema,
  RetrieveProjectDataSchema,
} from "./project.js";
export type { ProjectToolOptions } from "./project.js";
export {
  KnowledgeBase,
  knowledgeTools,
  ENTITY_TYPES,
  EntityTypeSchema,
  EntityIdSchema,
} from "./knowledge.js";
export type { Entity, EntityType } from "./knowledge.js";
