export type AnalysisErrorCode =
  | "unresolved_dependency"
  | "analysis_timeout"
  | "concurrency_limit_exceeded"
  | "invalid_configuration"
  | "job_not_found"
  | "project_not_found"
  | "analysis_failed";

export class AnalysisEngineError extends Error {
  readonly code: AnalysisErrorCode;
  readonly retryable: boolean;

  constructor(code: AnalysisErrorCode, message: string, retryable = false) {
    super(message);
    this.name = "AnalysisEngineError";
    this.code = code;
    this.retryable = retryable;
  }
}

export class UnresolvedDependencyError extends AnalysisEngineError {
  readonly dependencyName: string;

  constructor(dependencyName: string, reason: string) {
    super("unresolved_dependency", `could not resolve direct dependency ${dependencyName}: ${reason}`);
    this.name = "UnresolvedDependencyError";
    this.dependencyName = dependencyName;
  }
}

export class AnalysisTimeoutError extends AnalysisEngineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("analysis_timeout", `metadata lookups exceeded ${timeoutMs}ms`);
    this.name = "AnalysisTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConcurrencyLimitExceededError extends AnalysisEngineError {
  readonly projectId: string;
  readonly limit: number;

  constructor(projectId: string, limit: number) {
    super(
      "concurrency_limit_exceeded",
      `project ${projectId} already has ${limit} active analysis jobs`,
      true,
    );
    this.name = "ConcurrencyLimitExceededError";
    this.projectId = projectId;
    this.limit = limit;
  }
}

export class InvalidConfigurationError extends AnalysisEngineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("invalid_configuration", `invalid analysis configuration: ${issues.join("; ")}`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

export class JobNotFoundError extends AnalysisEngineError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("job_not_found", `analysis job not found: ${jobId}`);
    this.name = "JobNotFoundError";
    this.jobId = jobId;
  }
}

export class ProjectNotFoundError extends AnalysisEngineError {
  readonly projectId: string;

  constructor(projectId: string) {
    super("project_not_found", `project not found: ${projectId}`);
    this.name = "ProjectNotFoundError";
    this.projectId = projectId;
  }
}

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === "string" ? error : "unknown error";
};

export const toErrorCode = (error: unknown): AnalysisErrorCode =>
  error instanceof AnalysisEngineError ? error.code : "analysis_failed";
