export * from './common.js';
export * from './event.js';
export * from './program.js';
export * from './report.js';
export * from './ven.js';
export * from './subscription.js';
export * from './auth-server.js';
export {
  Validator,
  ValidatorPlugin,
  ValidatorPluginRegistry,
  runPluginValidators,
  type ModelKind,
  type ModelTypeMap,
} from './plugin.js';
export { parseWithSchema, withCreationGuard, hasBeenCreated } from './validation.js';
