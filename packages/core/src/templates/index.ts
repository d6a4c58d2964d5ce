export { extractReferences } from './extractor.js';
export { parseTemplates, isTemplateFile, TEMPLATES_DIR, type TemplateScan } from './walker.js';
