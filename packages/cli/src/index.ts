export {
  PerformanceConfigSchema,
  SignalSpecSchema,
  parseConfig,
  applyOverrides,
  loadConfig,
  type PerformanceConfig,
  type ConfigOverrides,
} from "./config";
export { loadSong } from "./loadSong";
export {
  PerformanceManager,
  defaultGenerators,
  type PerformanceManagerOptions,
} from "./PerformanceManager";
