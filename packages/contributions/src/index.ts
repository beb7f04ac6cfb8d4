export { NetworkError, ParseError } from './errors.js'
export { contributionsUrl, fetchContributionGrid, fetchContributionsHtml, REQUEST_TIMEOUT_MS, USER_AGENT } from './fetch.js'
export { DAYS_PER_WEEK, decodeRowIndex, firstAttr, parseContributionGrid, ROW_PITCH } from './parse.js'
