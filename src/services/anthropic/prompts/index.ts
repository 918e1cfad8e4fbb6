export { CLASSIFICATION_SYSTEM_PROMPT } from './classification.js';
