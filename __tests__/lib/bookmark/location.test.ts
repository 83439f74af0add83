import { canonicalizeLocation, deriveLabel, isLocalLocation } from '../../../lib/bookmark/location'

const HOME = '/home/u'

function canonical(raw: string): string | null {
  const result = canonicalizeLocation(raw, HOME)
  return result.success ? result.location : null
}

describe('canonicalizeLocation', () => {
  it('keeps an already canonical file URI unchanged', () => {
    expect(canonical('file:///home/u/Documents')).toBe('file:///home/u/Documents')
  })

  it('turns an absolute path into a percent-encoded file URI', () => {
    expect(canonical('/home/u/My Docs')).toBe('file:///home/u/My%20Docs')
  })

  it('expands a leading ~ to the base directory', () => {
    expect(canonical('~/Music')).toBe('file:///home/u/Music')
    expect(canonical('~')).toBe('file:///home/u')
  })

  it('normalizes separators, dot segments and trailing slashes', () => {
    expect(canonical('\\home\\u\\Videos')).toBe('file:///home/u/Videos')
    expect(canonical('file:///home/u/a/../b/')).toBe('file:///home/u/b')
    expect(canonical('/home//u/./Pictures/')).toBe('file:///home/u/Pictures')
    expect(canonical('/')).toBe('file:///')
  })

  it('re-encodes escapes in upper case and keeps GLib-safe characters literal', () => {
    expect(canonical('file:///home/u/caf%c3%a9')).toBe('file:///home/u/caf%C3%A9')
    expect(canonical('file:///srv/a%3Ab')).toBe('file:///srv/a:b')
    expect(canonical('/srv/50% off')).toBe('file:///srv/50%25%20off')
  })

  it('accepts file://localhost and drops the host', () => {
    expect(canonical('file://localhost/tmp')).toBe('file:///tmp')
  })

  it('passes remote URIs through in normalized form', () => {
    expect(canonical('sftp://host.example/share')).toBe('sftp://host.example/share')
    expect(canonical('SMB://Server/Public')).toBe('smb://Server/Public')
  })

  it('is idempotent', () => {
    for (const raw of ['/home/u/My Docs', '~/café', 'file:///srv/a%3Ab', 'sftp://host.example/share']) {
      const once = canonical(raw)
      expect(once).not.toBeNull()
      expect(canonical(once ?? '')).toBe(once)
    }
  })

  it.each([
    ['', 'empty'],
    ['Documents', 'relative path'],
    ['mailto:someone', 'non-hierarchical URI'],
    ['file://server/share', 'remote file host'],
    ['file:///home/u/a%2Fb', 'encoded slash'],
    ['file:///home/u/a%zz', 'broken escape'],
    ['file:///home/u/a?x=1', 'query'],
  ])('rejects %j (%s)', (raw) => {
    const result = canonicalizeLocation(raw, HOME)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.type).toBe('malformedLocation')
    }
  })
})

describe('deriveLabel', () => {
  it('uses the decoded last path segment', () => {
    expect(deriveLabel('file:///home/u/My%20Docs')).toBe('My Docs')
    expect(deriveLabel('sftp://host.example/srv/backups')).toBe('backups')
  })

  it('falls back to the host, then the location itself', () => {
    expect(deriveLabel('sftp://host.example/')).toBe('host.example')
    expect(deriveLabel('file:///')).toBe('file:///')
    expect(deriveLabel('not a uri')).toBe('not a uri')
  })
})

describe('isLocalLocation', () => {
  it('distinguishes file URIs from remote ones', () => {
    expect(isLocalLocation('file:///home/u')).toBe(true)
    expect(isLocalLocation('sftp://host/')).toBe(false)
  })
})
