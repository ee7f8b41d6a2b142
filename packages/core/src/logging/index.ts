export { createConsoleLogger } from './console-logger';
