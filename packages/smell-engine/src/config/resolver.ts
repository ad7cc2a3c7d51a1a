/**
 * Configuration resolver - merges ordered layers into one effective config
 */

import type { ConfigLayer, RuleConfig } from './schema.js';
import type { RuleConfiguration } from '../rules/rule.js';
import type { RuleRegistry } from '../rules/registry.js';
import type { ConfigWarning, Note } from '../types.js';
import { logWarning } from '../utils/logger.js';
import { compareStrings } from '../utils/ordering.js';
import { matchesPattern } from '../utils/pattern-matcher.js';

/**
 * Layers for one module, lowest priority first
 */
export interface ModuleConfig {
  layers: readonly ConfigLayer[];
  excludes: readonly string[];
  failFast: boolean;
}

export interface ResolveOptions {
  /** When false, rules requiring extra context are disabled (degraded mode) */
  semanticContextAvailable?: boolean;
}

/**
 * Fully merged configuration for one analysis run
 */
export interface EffectiveConfig {
  readonly rules: ReadonlyMap<string, RuleConfiguration>;
  readonly excludes: readonly string[];
  readonly failFast: boolean;
  readonly warnings: readonly ConfigWarning[];
  /** Degraded-mode downgrades */
  readonly notes: readonly Note[];
  ruleConfig(ruleId: string): RuleConfiguration | undefined;
  isEnabled(ruleId: string): boolean;
  /** Enabled rule ids in ascending order */
  activeRuleIds(): string[];
  /** Matches a module-relative, forward-slash path against the excludes */
  isExcluded(relativePath: string): boolean;
}

export function createModuleConfig(layers: readonly ConfigLayer[]): ModuleConfig {
  const merged = layers.reduce<ConfigLayer>((acc, layer) => mergeLayers(acc, layer), {});
  return {
    layers,
    excludes: merged.excludes ?? [],
    failFast: merged.failFast ?? false,
  };
}

/**
 * Combine two layers as if `b` were applied after `a`
 */
export function mergeLayers(a: ConfigLayer, b: ConfigLayer): ConfigLayer {
  const rules: Record<string, RuleConfig> = { ...a.rules };
  for (const [ruleId, entry] of Object.entries(b.rules ?? {})) {
    rules[ruleId] = mergeRuleEntry(rules[ruleId], entry);
  }

  const merged: ConfigLayer = {
    name: [a.name, b.name].filter((name) => name !== undefined).join('+') || undefined,
    rules,
    excludes: unionPatterns([a.excludes ?? [], b.excludes ?? []]),
  };

  const failFast = b.failFast ?? a.failFast;
  if (failFast !== undefined) {
    merged.failFast = failFast;
  }

  return merged;
}

function mergeRuleEntry(previous: RuleConfig | undefined, next: RuleConfig): RuleConfig {
  const merged: RuleConfig = { ...previous };
  if (next.enabled !== undefined) merged.enabled = next.enabled;
  if (next.severity !== undefined) merged.severity = next.severity;
  if (next.parameters !== undefined) merged.parameters = next.parameters;
  if (next.autoCorrect !== undefined) merged.autoCorrect = next.autoCorrect;
  return merged;
}

function unionPatterns(groups: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const patterns: string[] = [];
  for (const group of groups) {
    for (const pattern of group) {
      if (!seen.has(pattern)) {
        seen.add(pattern);
        patterns.push(pattern);
      }
    }
  }
  return patterns;
}

/**
 * Resolve layers against the registry. Unknown rule ids and invalid
 * parameters become warnings; merging continues with the rest.
 */
export function resolve(
  source: readonly ConfigLayer[] | ModuleConfig,
  registry: RuleRegistry,
  options: ResolveOptions = {}
): EffectiveConfig {
  const layers = isModuleConfig(source) ? source.layers : source;
  const rules = new Map<string, RuleConfiguration>();
  const warnings: ConfigWarning[] = [];
  const notes: Note[] = [];

  for (const rule of registry.all()) {
    rules.set(rule.id, {
      enabled: rule.defaultEnabled,
      severity: rule.severity,
      parameters: {},
      autoCorrect: rule.autoCorrect !== undefined,
    });
  }

  let failFast = false;

  layers.forEach((layer, index) => {
    const layerName = layer.name ?? `layer ${index}`;

    for (const [ruleId, entry] of Object.entries(layer.rules ?? {})) {
      const current = rules.get(ruleId);
      const descriptor = registry.lookup(ruleId);
      if (!current || !descriptor) {
        logWarning(`Unknown rule '${ruleId}' in ${layerName}`);
        warnings.push({ code: 'unknown-rule-id', ruleId, layer: layerName });
        continue;
      }

      const next: RuleConfiguration = { ...current };
      if (entry.enabled !== undefined) next.enabled = entry.enabled;
      if (entry.severity !== undefined) next.severity = entry.severity;
      if (entry.autoCorrect !== undefined) {
        next.autoCorrect = entry.autoCorrect && descriptor.autoCorrect !== undefined;
      }

      if (entry.parameters !== undefined) {
        const check = descriptor.parameters?.safeParse(entry.parameters);
        if (check && !check.success) {
          warnings.push({
            code: 'invalid-parameters',
            ruleId,
            layer: layerName,
            message: check.error.issues
              .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
              .join('; '),
          });
          // full replace: a rejected set leaves the rule on its defaults
          next.parameters = {};
        } else {
          next.parameters = { ...entry.parameters };
        }
      }

      rules.set(ruleId, next);
    }

    if (layer.failFast !== undefined) {
      failFast = layer.failFast;
    }
  });

  const excludes = unionPatterns([
    ...layers.map((layer) => layer.excludes ?? []),
    isModuleConfig(source) ? source.excludes : [],
  ]);
  if (isModuleConfig(source) && source.failFast) {
    failFast = true;
  }

  if (options.semanticContextAvailable === false) {
    for (const descriptor of registry.all()) {
      const config = rules.get(descriptor.id);
      if (descriptor.requiresExtraContext && config?.enabled) {
        rules.set(descriptor.id, { ...config, enabled: false });
        notes.push({
          kind: 'rule-degraded',
          ruleId: descriptor.id,
          message: `Rule '${descriptor.id}' needs type information and was disabled because none is available.`,
        });
      }
    }
  }

  return createEffectiveConfig(rules, excludes, failFast, warnings, notes);
}

function isModuleConfig(source: readonly ConfigLayer[] | ModuleConfig): source is ModuleConfig {
  return !Array.isArray(source);
}

function createEffectiveConfig(
  rules: Map<string, RuleConfiguration>,
  excludes: string[],
  failFast: boolean,
  warnings: ConfigWarning[],
  notes: Note[]
): EffectiveConfig {
  const frozenRules = new Map<string, RuleConfiguration>();
  for (const [ruleId, config] of rules) {
    frozenRules.set(ruleId, Object.freeze({ ...config, parameters: Object.freeze({ ...config.parameters }) }));
  }
  const active = Array.from(frozenRules.entries())
    .filter(([, config]) => config.enabled)
    .map(([ruleId]) => ruleId)
    .sort(compareStrings);

  return {
    rules: frozenRules,
    excludes: Object.freeze([...excludes]),
    failFast,
    warnings: Object.freeze([...warnings]),
    notes: Object.freeze([...notes]),
    ruleConfig: (ruleId) => frozenRules.get(ruleId),
    isEnabled: (ruleId) => frozenRules.get(ruleId)?.enabled === true,
    activeRuleIds: () => [...active],
    isExcluded: (relativePath) => matchesPattern(relativePath, excludes),
  };
}

