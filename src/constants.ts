export const constants = {
  CLI_NAME: 'pages-env-sync',
  CLOUDFLARE_API_BASE_URL: 'https://api.cloudflare.com/client/v4',
  REQUEST_TIMEOUT_MS: 10_000,
  DEFAULT_ENVIRONMENT: 'production'
} as const

/** Environment variables consulted when an option is not passed. */
export const ENV_VARS = {
  account: 'CLOUDFLARE_ACCOUNT',
  token: 'CLOUDFLARE_TOKEN',
  project: 'CF_PAGES_PROJECT',
  deployment: 'CF_PAGES_DEPLOYMENT',
  output: 'CF_PAGES_OUTPUT',
  file: 'CF_PAGES_FILE',
  environment: 'CF_PAGES_ENVIRONMENT',
  empty: 'CF_PAGES_EMPTY'
} as const
