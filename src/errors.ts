import type { OutputFormat, RepositoryFailure } from "@/types"

export type ErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "NO_REPOSITORIES"
  | "NOT_A_REPOSITORY"
  | "BRANCH_NOT_FOUND"
  | "READ_FAILURE"
  | "ALL_REPOSITORIES_FAILED"
  | "RENDER_ERROR"

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly exitCode: number
  readonly hint?: string

  constructor(message: string, hint?: string) {
    super(message)
    this.name = this.constructor.name
    this.hint = hint
  }
}

export class ConfigError extends AppError {
  readonly code = "CONFIG_ERROR" as const
  readonly exitCode = 3

  constructor(message: string, hint?: string) {
    super(message, hint)
  }
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR" as const
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
  }
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND" as const
  readonly exitCode = 4

  constructor(message: string) {
    super(message)
  }
}

export class NoRepositoriesError extends AppError {
  readonly code = "NO_REPOSITORIES" as const
  readonly exitCode = 3

  constructor() {
    super(
      "no repositories to analyze",
      "pass --repo <path>, register one with `churnscope add <path>`, or run inside a git repository",
    )
  }
}

/** A failure attributable to a single repository; never aborts its siblings. */
export abstract class CollectionError extends AppError {
  readonly exitCode = 5
  readonly repository: string
  readonly path: string

  constructor(repository: string, path: string, message: string) {
    super(message)
    this.repository = repository
    this.path = path
  }
}

export class NotARepositoryError extends CollectionError {
  readonly code = "NOT_A_REPOSITORY" as const

  constructor(repository: string, path: string) {
    super(repository, path, `not a git repository: ${path}`)
  }
}

export class BranchNotFoundError extends CollectionError {
  readonly code = "BRANCH_NOT_FOUND" as const
  readonly branch: string

  constructor(repository: string, path: string, branch: string) {
    super(repository, path, `branch "${branch}" not found in ${path}`)
    this.branch = branch
  }
}

export class ReadFailureError extends CollectionError {
  readonly code = "READ_FAILURE" as const
  readonly detail: string

  constructor(repository: string, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(repository, path, `failed to read history of ${path}: ${detail}`)
    this.detail = detail
  }
}

export class AllRepositoriesFailedError extends AppError {
  readonly code = "ALL_REPOSITORIES_FAILED" as const
  readonly exitCode = 5
  readonly failures: RepositoryFailure[]

  constructor(failures: RepositoryFailure[]) {
    const lines = failures.map((f) => `  ${f.name}: ${f.error.message}`)
    super(
      [
        `all ${failures.length} repositories failed to collect`,
        ...lines,
      ].join("\n"),
    )
    this.failures = failures
  }
}

export class RenderError extends AppError {
  readonly code = "RENDER_ERROR" as const
  readonly exitCode = 1

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(
      `terminal UI failed: ${detail}`,
      "rerun with --output table for a non-interactive report",
    )
  }
}

/** Process exit code for any thrown value. */
export function exitCodeOf(err: unknown): number {
  return err instanceof AppError ? err.exitCode : 1
}

export function handleError(err: unknown, format: OutputFormat): never {
  let message: string
  let code: string | undefined
  let hint: string | undefined

  if (err instanceof AppError) {
    message = err.message
    code = err.code
    hint = err.hint
  } else if (err instanceof Error) {
    message = err.message
  } else {
    message = String(err)
  }

  if (format === "json") {
    const payload: Record<string, unknown> = { success: false, error: message }
    if (code) payload.code = code
    if (hint) payload.hint = hint
    console.log(JSON.stringify(payload, null, 2))
  } else {
    console.error(`Error: ${message}`)
    if (hint) console.error(`Hint: ${hint}`)
  }

  process.exit(exitCodeOf(err))
}
