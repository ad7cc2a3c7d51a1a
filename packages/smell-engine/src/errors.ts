/**
 * Fatal setup errors. Per-file and per-rule problems are reported as
 * diagnostics in the result instead.
 */

export type EngineErrorCode =
  | 'DUPLICATE_RULE_ID'
  | 'REGISTRY_CLOSED'
  | 'INVALID_RULE_ID'
  | 'CONFIG_LOAD_FAILED'
  | 'BASELINE_FORMAT';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateRuleIdError extends EngineError {
  readonly ruleId: string;

  constructor(ruleId: string) {
    super('DUPLICATE_RULE_ID', `Rule '${ruleId}' is already registered`);
    this.ruleId = ruleId;
  }
}

export class RegistryClosedError extends EngineError {
  readonly ruleId: string;

  constructor(ruleId: string) {
    super('REGISTRY_CLOSED', `Cannot register rule '${ruleId}': registry is sealed`);
    this.ruleId = ruleId;
  }
}

export class InvalidRuleIdError extends EngineError {
  readonly ruleId: string;

  constructor(ruleId: string) {
    super(
      'INVALID_RULE_ID',
      `Invalid rule id '${ruleId}'. Use lowercase segments joined by '-' or '/'.`
    );
    this.ruleId = ruleId;
  }
}

export class ConfigLoadError extends EngineError {
  readonly configPath: string;

  constructor(configPath: string, cause: unknown) {
    super(
      'CONFIG_LOAD_FAILED',
      `Failed to load config from ${configPath}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.configPath = configPath;
  }
}

export class BaselineFormatError extends EngineError {
  readonly baselinePath: string;

  constructor(baselinePath: string, detail: string) {
    super(
      'BASELINE_FORMAT',
      `Invalid baseline file "${baselinePath}". ${detail}`
    );
    this.baselinePath = baselinePath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
