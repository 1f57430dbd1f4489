import axios from 'axios'

const ERROR_RESPONSE_MAX_LENGTH = 200 // Max length of error response to include in logs

export type LaundryErrorKind = 'config' | 'token-load' | 'auth' | 'transient'

/**
 * Base class for the failures the engine reports.
 * None of them is fatal: each one degrades to "try again next cycle".
 */
export abstract class LaundryError extends Error {
  abstract readonly kind: LaundryErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** No appliance is enabled; the engine stays idle. */
export class ConfigError extends LaundryError {
  readonly kind = 'config'
}

/** The token file is missing or malformed. */
export class TokenLoadError extends LaundryError {
  readonly kind = 'token-load'

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** The status API answered 401. */
export class AuthError extends LaundryError {
  readonly kind = 'auth'
}

/** Any other HTTP, network or parse failure. */
export class TransientError extends LaundryError {
  readonly kind = 'transient'
}

// Helper to extract URL path from absolute or relative URLs
function extractUrlPath(url: string | undefined): string {
  if (!url) return ''

  try {
    return new URL(url).pathname
  } catch {
    return url
  }
}

export function formatAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status
    const statusText = error.response?.statusText
    const method = error.config?.method?.toUpperCase()
    const url = error.config?.url

    let formatted = error.message
    if (status) {
      const statusPart = statusText ? ` ${statusText}` : ''
      formatted += ` (${status}${statusPart})`
    }
    if (method && url) {
      formatted += ` [${method} ${extractUrlPath(url)}]`
    }

    if (error.response?.data && typeof error.response.data === 'object') {
      const responseStr = JSON.stringify(error.response.data)
      if (responseStr.length < ERROR_RESPONSE_MAX_LENGTH) {
        formatted += ` - ${responseStr}`
      }
    }

    return formatted
  }
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
