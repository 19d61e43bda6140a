export { MessageBuilder, textMessage } from './MessageBuilder.js';
export { MessageValidator } from './MessageValidator.js';
export type { ValidationProblem } from './MessageValidator.js';
export { ParamsValidator } from './ParamsValidator.js';
