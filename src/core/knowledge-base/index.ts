/**
 * Knowledge Base Module
 *
 * @module
 */

export * from "./interfaces/IKnowledgeBase.js";
export { UnifiedKnowledgeBase, type UnifiedKnowledgeBaseOptions } from "./impl/UnifiedKnowledgeBase.js";
