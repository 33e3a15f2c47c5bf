export { createGenerateCommand } from './generate.js';
export { createInitCommand } from './init.js';
export { createSignaturesCommand } from './signatures.js';
