export enum ProvisionErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  NO_PACKAGE_MANAGER = 'NO_PACKAGE_MANAGER',
  DECLINED = 'DECLINED',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  INSTALL_FAILED = 'INSTALL_FAILED',
  SCRIPTED_SESSION_FAILED = 'SCRIPTED_SESSION_FAILED',
  AGENT_MISSING = 'AGENT_MISSING',
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: ProvisionErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'ProvisionError'
    this.code = code
    this.context = context
  }
}

export function isProvisionError(error: unknown, code?: ProvisionErrorCode): error is ProvisionError {
  return error instanceof ProvisionError && (code === undefined || error.code === code)
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
