import fs from 'node:fs'
import { z } from 'zod'
import { TokenLoadError } from '../errors.js'

const tokensFileSchema = z.object({
  accessToken: z.string().min(1).optional(),
  refreshToken: z.string().min(1),
  // epoch seconds
  expiresAt: z.number().positive().optional(),
})

export type TokensFile = z.infer<typeof tokensFileSchema>

export interface TokenState {
  accessToken?: string
  refreshToken?: string
  expiresAt?: Date
}

export type TokenLoadResult = { ok: true; tokens: TokenState } | { ok: false; error: TokenLoadError }

/**
 * Reads and writes the OAuth token file. No network access happens here.
 */
export class TokenStore {
  constructor(readonly filePath: string) {}

  public load(): TokenLoadResult {
    let raw: string
    try {
      raw = fs.readFileSync(this.filePath, 'utf8')
    } catch (error) {
      const message = fs.existsSync(this.filePath) ? 'is not readable' : 'is missing'
      return { ok: false, error: new TokenLoadError(`${this.filePath} ${message}`, this.filePath, { cause: error }) }
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      return { ok: false, error: new TokenLoadError(`${this.filePath} is not valid JSON`, this.filePath, { cause: error }) }
    }

    const result = tokensFileSchema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
      return {
        ok: false,
        error: new TokenLoadError(`${this.filePath} is malformed (${issues})`, this.filePath, { cause: result.error }),
      }
    }

    const { accessToken, refreshToken, expiresAt } = result.data
    return {
      ok: true,
      tokens: {
        accessToken,
        refreshToken,
        expiresAt: expiresAt === undefined ? undefined : new Date(expiresAt * 1000),
      },
    }
  }

  /**
   * Replace the token file atomically: write a sibling temp file, then rename it over the target
   */
  public save(tokens: TokenState): void {
    const content: Partial<TokensFile> = {
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: tokens.expiresAt ? Math.floor(tokens.expiresAt.getTime() / 1000) : undefined,
    }
    const tmpPath = `${this.filePath}.tmp`
    fs.writeFileSync(tmpPath, JSON.stringify(content, null, 2), { encoding: 'utf8', mode: 0o600 })
    fs.renameSync(tmpPath, this.filePath)
  }
}
