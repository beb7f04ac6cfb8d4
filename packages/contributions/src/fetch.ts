import type { BinaryMatrix } from '@contrib-life/life'
import { createLogger } from '@contrib-life/logger'
import { NetworkError } from './errors.js'
import { parseContributionGrid } from './parse.js'

const logger = createLogger('contributions')

/** How long in milliseconds to wait for the contributions page */
export const REQUEST_TIMEOUT_MS = 15_000

export const USER_AGENT = 'Mozilla/5.0 (compatible; ContribLife/1.0)'

export function contributionsUrl(identity: string): string {
  return `https://github.com/users/${encodeURIComponent(identity)}/contributions`
}

/**
 * Downloads the contributions page for a user.
 * Makes a single attempt, there is no retry.
 *
 * @param identity - Account handle the page belongs to
 * @returns The page's HTML
 */
export async function fetchContributionsHtml(identity: string): Promise<string> {
  const url = contributionsUrl(identity)
  logger.debug(`GET ${url}`)

  let response: Response
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    })
  }
  catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new NetworkError(`Request to ${url} failed: ${reason}`, { cause: error })
  }

  if (!response.ok) {
    throw new NetworkError(
      `Request to ${url} failed with status ${response.status}`,
      { status: response.status },
    )
  }

  try {
    return await response.text()
  }
  catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new NetworkError(`Reading response from ${url} failed: ${reason}`, { cause: error })
  }
}

/** Fetches a user's contributions page and scrapes it into a 7-row matrix */
export async function fetchContributionGrid(identity: string): Promise<BinaryMatrix> {
  const html = await fetchContributionsHtml(identity)
  const grid = parseContributionGrid(html)
  logger.debug(`Parsed ${grid[0].length} week columns for ${identity}`)
  return grid
}
