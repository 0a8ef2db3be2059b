/**
 * Configuration every service carries
 */
export interface BaseServiceConfig {
  useEnhancedLogging?: boolean;
}
