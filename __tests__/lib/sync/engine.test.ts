import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { SyncEngine, sync } from '../../../lib/sync'

const GTK_PATH = ['.config', 'gtk-3.0', 'bookmarks']
const KDE_PATH = ['.local', 'share', 'user-places.xbel']
const QT_PATH = ['.config', 'QtProject.conf']

const EXPECTED_XBEL = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<!DOCTYPE xbel>',
  '<xbel xmlns:bookmark="http://www.freedesktop.org/standards/desktop-bookmarks"' +
    ' xmlns:kdepriv="http://www.kde.org/kdepriv"' +
    ' xmlns:mime="http://www.freedesktop.org/standards/shared-mime-info">',
  ' <bookmark href="file:///home/u/Documents">',
  '  <title>Documents</title>',
  '  <info>',
  '   <metadata owner="http://freedesktop.org">',
  '    <bookmark:icon name="folder"/>',
  '   </metadata>',
  '  </info>',
  ' </bookmark>',
  '</xbel>',
  '',
].join('\n')

const EXPECTED_QT = [
  '[FileDialog]',
  'shortcuts\\size=1',
  'shortcuts\\1=file:///home/u/Documents',
  'labels\\size=1',
  'labels\\1=Documents',
  '',
].join('\n')

describe('SyncEngine', () => {
  let base: string

  async function put(path: string[], content: string): Promise<void> {
    const file = join(base, ...path)
    await mkdir(dirname(file), { recursive: true })
    await writeFile(file, content)
  }

  function read(path: string[]): Promise<string> {
    return readFile(join(base, ...path), 'utf8')
  }

  beforeEach(async () => {
    base = await mkdtemp(join(tmpdir(), 'places-sync-'))
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    jest.restoreAllMocks()
    await rm(base, { recursive: true, force: true })
  })

  it('resolves each store below the base directory', () => {
    const engine = new SyncEngine({ baseDirectory: '/home/u' })
    expect(engine.resolvePath('gtk')).toBe('/home/u/.config/gtk-3.0/bookmarks')
    expect(engine.resolvePath('kde')).toBe('/home/u/.local/share/user-places.xbel')
    expect(engine.resolvePath('qt')).toBe('/home/u/.config/QtProject.conf')
  })

  it('projects the GTK list onto the KDE and Qt stores', async () => {
    await put(GTK_PATH, 'file:///home/u/Documents Documents\n')

    const result = await sync('gtk', base)

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.changes).toBe(2)
    expect(result.warnings).toEqual([])
    expect(result.targets.map((target) => [target.format, target.status])).toEqual([
      ['kde', 'written'],
      ['qt', 'written'],
    ])
    expect(await read(KDE_PATH)).toBe(EXPECTED_XBEL)
    expect(await read(QT_PATH)).toBe(EXPECTED_QT)
    expect(await read(GTK_PATH)).toBe('file:///home/u/Documents Documents\n')
  })

  it('produces identical files and no changes when run again', async () => {
    await put(GTK_PATH, 'file:///home/u/Documents Documents\n')
    await sync('gtk', base)

    const second = await sync('gtk', base)

    expect(second.success && second.changes).toBe(0)
    expect(await read(KDE_PATH)).toBe(EXPECTED_XBEL)
    expect(await read(QT_PATH)).toBe(EXPECTED_QT)
  })

  it('syncs from the Qt store back to GTK', async () => {
    await put(QT_PATH, EXPECTED_QT)

    const result = await sync('qt', base)

    expect(result.success).toBe(true)
    expect(await read(GTK_PATH)).toBe('file:///home/u/Documents Documents\n')
    expect(await read(KDE_PATH)).toBe(EXPECTED_XBEL)
  })

  it('fails without writing anything when the source is missing', async () => {
    const result = await sync('gtk', base)

    expect(result).toMatchObject({ success: false, source: 'gtk', errorType: 'sourceMissing', targets: [] })
    expect(await readdir(base)).toEqual([])
  })

  it('fails without writing anything when the source document is malformed', async () => {
    await put(KDE_PATH, '<xbel><bookmark href="file:///a"></xbel>')

    const result = await sync('kde', base)

    expect(result).toMatchObject({ success: false, errorType: 'malformedDocument', targets: [] })
    expect(await readdir(base)).toEqual(['.local'])
  })

  it('skips a malformed entry with a warning and syncs the rest', async () => {
    await put(GTK_PATH, 'relative Broken\nfile:///home/u/Music Music\n')

    const result = await sync('gtk', base)

    expect(result.success).toBe(true)
    expect(result.warnings).toMatchObject([{ kind: 'malformedLocation', line: 1, raw: 'relative Broken' }])
    expect(await read(QT_PATH)).toBe(
      '[FileDialog]\nshortcuts\\size=1\nshortcuts\\1=file:///home/u/Music\nlabels\\size=1\nlabels\\1=Music\n'
    )
  })

  it('keeps writing other targets when one cannot be written', async () => {
    await put(GTK_PATH, 'file:///home/u/Documents Documents\n')
    await put(['.local', 'share'], 'not a directory')

    const result = await sync('gtk', base)

    expect(result).toMatchObject({ success: false, errorType: 'filesystem', error: '目标写入失败: kde' })
    expect(result.targets).toMatchObject([
      { format: 'kde', status: 'failed', errorType: 'filesystem' },
      { format: 'qt', status: 'written' },
    ])
    expect(await read(QT_PATH)).toBe(EXPECTED_QT)
  })

  it('reports the diff without writing in a dry run', async () => {
    await put(GTK_PATH, 'file:///home/u/Documents Documents\n')

    const result = await sync('gtk', base, { dryRun: true })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.changes).toBe(2)
    expect(result.targets).toMatchObject([
      { format: 'kde', status: 'skipped', reason: 'dryRun' },
      { format: 'qt', status: 'skipped', reason: 'dryRun' },
    ])
    expect(await readdir(base)).toEqual(['.config'])
    expect(await readdir(join(base, '.config'))).toEqual(['gtk-3.0'])
  })

  it('regenerates a target whose previous content is malformed', async () => {
    await put(GTK_PATH, 'file:///home/u/Documents Documents\n')
    await put(QT_PATH, '[FileDialog]\nshortcuts\\size=x\n')

    const result = await sync('gtk', base)

    expect(result.success).toBe(true)
    const qt = result.targets.find((target) => target.format === 'qt')
    expect(qt).toMatchObject({ status: 'written', previousError: 'Qt 配置无法解析: shortcuts\\size 不是有效数字: x' })
    expect(await read(QT_PATH)).toBe(EXPECTED_QT)
  })

  it('keeps KDE system places when writing the KDE store', async () => {
    const trash = [
      ' <bookmark href="trash:/">',
      '  <title>Trash</title>',
      '  <info>',
      '   <metadata owner="http://freedesktop.org">',
      '    <bookmark:icon name="user-trash"/>',
      '   </metadata>',
      '   <metadata owner="http://www.kde.org">',
      '    <isSystemItem>true</isSystemItem>',
      '   </metadata>',
      '  </info>',
      ' </bookmark>',
    ].join('\n')
    const lines = EXPECTED_XBEL.split('\n')
    await put(GTK_PATH, 'file:///home/u/Documents Documents\n')
    await put(KDE_PATH, [...lines.slice(0, 3), trash, '</xbel>', ''].join('\n'))

    await sync('gtk', base)

    expect(await read(KDE_PATH)).toBe([...lines.slice(0, 3), trash, ...lines.slice(3)].join('\n'))
  })
})
