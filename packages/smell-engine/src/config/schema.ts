/**
 * Configuration schema for the smell engine
 */

import { z } from 'zod';

export const severitySchema = z.enum(['style', 'warning', 'error', 'defect']);

/**
 * Schema for one rule's entry in a configuration layer
 */
export const ruleConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    severity: severitySchema.optional(),
    /** Replaces (not merges with) parameters set by earlier layers */
    parameters: z.record(z.string(), z.unknown()).optional(),
    autoCorrect: z.boolean().optional(),
  })
  .strict();

export type RuleConfig = z.infer<typeof ruleConfigSchema>;

/**
 * Schema for a configuration layer
 */
export const configLayerSchema = z.object({
  /** Label used in warnings */
  name: z.string().optional(),

  /**
   * Rule configuration (enable/disable, severity overrides, parameters)
   */
  rules: z.record(z.string(), ruleConfigSchema).optional(),

  /**
   * File patterns to exclude, added to those of earlier layers
   */
  excludes: z.array(z.string()).optional(),

  /**
   * Stop dispatching new files after the first failing finding
   */
  failFast: z.boolean().optional(),
});

export type ConfigLayer = z.infer<typeof configLayerSchema>;

/**
 * Schema for a configuration file: a layer plus project settings
 */
export const configFileSchema = configLayerSchema.extend({
  /**
   * Baseline file, relative to the module directory
   */
  baseline: z.string().optional(),

  maxIssues: z.number().int().nonnegative().optional(),

  failOnSeverity: z.union([severitySchema, z.literal('never')]).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
