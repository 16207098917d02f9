export { configSchema, type Config, loadConfig, resetConfigCache } from './env'
export {
  type ConsumerSettings,
  type LearnerSettings,
  type CoordinatorSettings,
  type MetricsSettings,
  type LoopSettings,
  getLoopSettings,
} from './settings'
