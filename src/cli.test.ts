import { describe, it, expect } from 'vitest'
import { parseCliArgs } from './cli.js'

const argv = (...args: string[]) => ['node', 'openobserve-mcp', ...args]

describe('parseCliArgs', () => {
  it('leaves unset flags undefined so env and file values survive', () => {
    const settings = parseCliArgs(argv())
    expect(Object.values(settings).every((v) => v === undefined)).toBe(true)
  })

  it('maps flags to settings', () => {
    const settings = parseCliArgs(argv(
      '--transport', 'http',
      '--port', '9000',
      '--stateless-http',
      '--auth-disabled',
      '--max-chars', '2000',
      '--default-stream', 'k8s',
      '--config', './settings.json',
    ))

    expect(settings).toMatchObject({
      transport: 'http',
      port: '9000',
      statelessHttp: true,
      authDisabled: true,
      maxChars: '2000',
      defaultStream: 'k8s',
      configPath: './settings.json',
    })
  })

  it('rejects an unknown transport', () => {
    expect(() => parseCliArgs(argv('--transport', 'sse'))).toThrow()
  })
})
