export { createAppConfig, WaitStrategySchema, type AppConfig, type WaitStrategyName } from './app-config';
export {
  DEFAULT_ANNOTATIONS,
  DEFAULT_DEPLOYMENT,
  DEFAULT_KUBERNETES,
  DEFAULT_POLLING,
  DEFAULT_TIMEOUTS,
} from './defaults';
