/**
 * Vitest setup: outbound network is disabled. Tests that need responses stub
 * globalThis.fetch themselves and restore this blocked version afterwards.
 */

const originalFetch = globalThis.fetch

async function blockedFetch(input: string | URL | Request): Promise<Response> {
  const target = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
  throw new Error(`Outbound network is disabled in tests (attempted ${target})`)
}

globalThis.fetch = blockedFetch

process.on('exit', () => {
  globalThis.fetch = originalFetch
})
