import type { DashboardUserConfig } from '$types';

/** Name of a user setting */
export type ConfigField = keyof DashboardUserConfig;

/** User settings holding a number, log levels included */
export type NumericField = {
  [K in ConfigField]: DashboardUserConfig[K] extends number ? K : never;
}[ConfigField];

/** User settings holding text */
export type TextField = {
  [K in ConfigField]: DashboardUserConfig[K] extends string ? K : never;
}[ConfigField];

export interface ValidationError {
  level: 'CRITICAL';
  field: ConfigField;
  message: string;
}

export interface ValidationWarning {
  level: 'WARNING';
  field: ConfigField;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Problems gathered over one validation pass
 */
export interface ValidationIssues {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

/**
 * Limits for one numeric setting
 */
export interface NumericLimits {
  min: number;
  max: number;
  /** Reject fractional values */
  integer?: boolean;
  /** Inclusive band outside which a valid value only warns */
  recommended?: readonly [number, number];
}
