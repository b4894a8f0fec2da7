// Case-insensitive substrings of non-browser clients. "http" also matches
// generic HTTP client libraries (httpie, http.rb, ...).
export const BOT_USER_AGENT_TOKENS: readonly string[] = [
  'bot',
  'crawler',
  'spider',
  'scraper',
  'curl',
  'wget',
  'python',
  'requests',
  'urllib',
  'http',
  'java',
  'go-http',
  'okhttp'
]

export function isSuspiciousUserAgent(
  userAgent: string | null | undefined,
  tokens: readonly string[] = BOT_USER_AGENT_TOKENS
): boolean {
  if (!userAgent || !userAgent.trim()) return true
  const normalized = userAgent.toLowerCase()
  return tokens.some((token) => normalized.includes(token))
}
