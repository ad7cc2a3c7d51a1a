/**
 * Rule registry - catalog of rule descriptors
 */

import type { RuleDescriptor } from './rule.js';
import {
  DuplicateRuleIdError,
  InvalidRuleIdError,
  RegistryClosedError,
} from '../errors.js';
import { noEmptyBlockRule } from './style/no-empty-block.js';
import { singleMethodObjectLiteralRule } from './style/single-method-object-literal.js';
import { functionKeywordSpacingRule } from './formatting/function-keyword-spacing.js';

const RULE_ID_PATTERN = /^[a-z0-9]+(?:[-/][a-z0-9]+)*$/;

export const BUILTIN_RULES: readonly RuleDescriptor[] = [
  noEmptyBlockRule,
  singleMethodObjectLiteralRule,
  functionKeywordSpacingRule,
];

/**
 * Rule registry. Open for registration until sealed; read-only afterwards.
 */
export class RuleRegistry {
  private rules: Map<string, RuleDescriptor> = new Map();
  private sealed = false;

  /**
   * Register a rule
   */
  register(rule: RuleDescriptor): void {
    if (this.sealed) {
      throw new RegistryClosedError(rule.id);
    }
    if (!RULE_ID_PATTERN.test(rule.id)) {
      throw new InvalidRuleIdError(rule.id);
    }
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleIdError(rule.id);
    }

    this.rules.set(rule.id, Object.freeze({ ...rule }));
  }

  registerAll(rules: Iterable<RuleDescriptor>): void {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  /**
   * Close the registry. Later register() calls fail.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  lookup(ruleId: string): RuleDescriptor | undefined {
    return this.rules.get(ruleId);
  }

  /**
   * All rules in registration order
   */
  all(): RuleDescriptor[] {
    return Array.from(this.rules.values());
  }

  /**
   * Get all rule IDs
   */
  ids(): string[] {
    return Array.from(this.rules.keys());
  }
}

/**
 * Sealed registry holding the bundled rules
 */
export function createBuiltinRegistry(extraRules: Iterable<RuleDescriptor> = []): RuleRegistry {
  const registry = new RuleRegistry();
  registry.registerAll(BUILTIN_RULES);
  registry.registerAll(extraRules);
  return registry.seal();
}
