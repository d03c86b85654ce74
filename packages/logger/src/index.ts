export {
  createLoggerOptions,
  defaultLoggerOptions,
  developmentTarget,
  type LoggerOptionsInput,
  type LogLevel,
  productionTarget,
  redactedPaths,
} from './options';
