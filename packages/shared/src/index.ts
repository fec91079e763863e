export {
  DEFAULT_CONFIG,
  configTemplate,
  type ConfigTemplateAnswers,
  type TrialkitConfig,
} from './config.js';
export { mkdirSafe } from './utils.js';
export {
  validateProtocol,
  formatValidation,
  type ValidationCheck,
  type ProtocolValidation,
  type Protocol,
  type ProtocolBlock,
  type JsonValue,
  type JsonObject,
} from './validation.js';
