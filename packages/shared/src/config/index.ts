export {
  PLATFORM_MODES,
  DEFAULT_DATABASE_URL,
  PlatformConfigSchema,
  loadPlatformConfig,
  getPlatformConfig,
  setPlatformConfig,
  resetPlatformConfig,
} from './platform-config';
export type { PlatformConfig, PlatformMode } from './platform-config';
