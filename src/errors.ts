export type PlanDigestErrorCode =
  | 'PLAN_NOT_FOUND'
  | 'INVALID_PLAN'
  | 'PLAN_NOT_ANALYZED'
  | 'INVALID_CONFIG'
  | 'TERRAFORM_FAILED';

export class PlanDigestError extends Error {
  readonly code: PlanDigestErrorCode;

  constructor(code: PlanDigestErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PlanFileNotFoundError extends PlanDigestError {
  constructor(readonly filePath: string) {
    super('PLAN_NOT_FOUND', `Plan file not found: ${filePath}`);
  }
}

export class InvalidPlanError extends PlanDigestError {
  constructor(readonly detail: string, options?: { cause?: unknown }) {
    super('INVALID_PLAN', `Invalid plan document: ${detail}`, options);
  }
}

export class PlanNotAnalyzedError extends PlanDigestError {
  constructor() {
    super('PLAN_NOT_ANALYZED', 'No plan has been analyzed yet');
  }
}

export class ConfigError extends PlanDigestError {
  constructor(readonly configPath: string, detail: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', `Invalid config ${configPath}: ${detail}`, options);
  }
}

export class TerraformCommandError extends PlanDigestError {
  constructor(readonly command: string, readonly stderr: string, options?: { cause?: unknown }) {
    super('TERRAFORM_FAILED', `\`${command}\` failed${stderr ? `: ${stderr.trim()}` : ''}`, options);
  }
}
