import { describe, it, expect, afterEach } from 'vitest'
import {
  archiveExtension,
  archiveRequest,
  chmodRequest,
  chownRequest,
  createRequest,
  deleteRequest,
  describeTaskKind,
  nextArchiveFormat,
  parseChmodMode,
  pasteRequests,
  renameRequest,
  submitRequests,
  unmountRequest
} from './taskRequests.js'
import { TaskManager } from './taskManager.js'

describe('pasteRequests', () => {
  it('creates one copy per clipboard path into the destination', () => {
    const requests = pasteRequests({ paths: ['/home/u/a.txt', '/home/u/docs'], mode: 'copy' }, '/srv')

    expect(requests).toEqual([
      {
        kind: { type: 'copy', src: '/home/u/a.txt', dest: '/srv/a.txt' },
        description: 'Copy "a.txt" -> "/srv"'
      },
      {
        kind: { type: 'copy', src: '/home/u/docs', dest: '/srv/docs' },
        description: 'Copy "docs" -> "/srv"'
      }
    ])
  })

  it('creates moves for a cut clipboard', () => {
    const requests = pasteRequests({ paths: ['/home/u/a.txt'], mode: 'move' }, '/srv')

    expect(requests).toEqual([
      {
        kind: { type: 'move', src: '/home/u/a.txt', dest: '/srv/a.txt' },
        description: 'Move "a.txt" -> "/srv"'
      }
    ])
  })

  it('does nothing without a clipboard mode', () => {
    expect(pasteRequests({ paths: ['/home/u/a.txt'], mode: null }, '/srv')).toEqual([])
  })
})

describe('single-path requests', () => {
  it('describes a delete by file name', () => {
    expect(deleteRequest('/var/tmp/old.log')).toEqual({
      kind: { type: 'delete', path: '/var/tmp/old.log' },
      description: 'Delete "old.log"'
    })
  })

  it('creates files and directories inside the given directory', () => {
    expect(createRequest('/work', 'notes.txt', 'file')).toEqual({
      kind: { type: 'create-file', path: '/work/notes.txt' },
      description: 'Create "/work/notes.txt"'
    })
    expect(createRequest('/work', 'build', 'directory')).toEqual({
      kind: { type: 'create-directory', path: '/work/build' },
      description: 'Create "/work/build"'
    })
  })

  it('renames as a move within the same directory', () => {
    expect(renameRequest('/home/u/a.txt', 'b.txt')).toEqual({
      kind: { type: 'move', src: '/home/u/a.txt', dest: '/home/u/b.txt' },
      description: 'Rename "/home/u/a.txt" to "/home/u/b.txt"'
    })
  })

  it('describes chmod in octal', () => {
    expect(chmodRequest('/opt/run.sh', 0o755).description).toBe('Chmod "run.sh" to 755')
  })

  it('describes chown with the owner spec', () => {
    expect(chownRequest('/srv/data', 'www:www')).toEqual({
      kind: { type: 'chown', path: '/srv/data', owner: 'www:www' },
      description: 'Chown "data" to www:www'
    })
  })

  it('describes unmount by mount point', () => {
    expect(unmountRequest('/mnt/usb').description).toBe('Unmount "/mnt/usb"')
  })
})

describe('parseChmodMode', () => {
  it('parses octal digits', () => {
    expect(parseChmodMode('755')).toBe(0o755)
    expect(parseChmodMode('0644')).toBe(0o644)
    expect(parseChmodMode(' 4755 ')).toBe(0o4755)
  })

  it('rejects anything else', () => {
    expect(parseChmodMode('')).toBeUndefined()
    expect(parseChmodMode('8')).toBeUndefined()
    expect(parseChmodMode('rwx')).toBeUndefined()
    expect(parseChmodMode('-755')).toBeUndefined()
    expect(parseChmodMode('77777777777')).toBeUndefined()
  })
})

describe('archive requests', () => {
  it('appends the extension for the format', () => {
    expect(archiveRequest(['/w/a', '/w/b'], '/w', 'backup', 'tar.gz')).toEqual({
      kind: { type: 'archive', paths: ['/w/a', '/w/b'], dest: '/w/backup.tar.gz', format: 'tar.gz' },
      description: 'Archive 2 items to "/w/backup.tar.gz"'
    })
  })

  it('names unknown formats .zip but keeps the tag', () => {
    const { kind } = archiveRequest(['/w/a'], '/w', 'backup', 'rar')

    expect(kind).toEqual({ type: 'archive', paths: ['/w/a'], dest: '/w/backup.zip', format: 'rar' })
  })

  it('requires a name and at least one path', () => {
    expect(() => archiveRequest(['/w/a'], '/w', '', 'zip')).toThrow('压缩包名称不能为空')
    expect(() => archiveRequest([], '/w', 'backup', 'zip')).toThrow('没有选择要压缩的文件')
  })

  it('maps formats to extensions', () => {
    expect(archiveExtension('zip')).toBe('.zip')
    expect(archiveExtension('tar')).toBe('.tar')
    expect(archiveExtension('tar.gz')).toBe('.tar.gz')
  })

  it('cycles through the supported formats', () => {
    expect(nextArchiveFormat('zip')).toBe('tar')
    expect(nextArchiveFormat('tar')).toBe('tar.gz')
    expect(nextArchiveFormat('tar.gz')).toBe('zip')
    expect(nextArchiveFormat('7z')).toBe('zip')
  })
})

describe('describeTaskKind', () => {
  it('labels an archive by item count and destination', () => {
    expect(describeTaskKind({ type: 'archive', paths: ['/a', '/b', '/c'], dest: '/out.tar', format: 'tar' }))
      .toBe('Archive 3 items to "/out.tar"')
  })
})

describe('submitRequests', () => {
  const manager = new TaskManager()

  afterEach(() => {
    manager.close()
  })

  it('adds every request as a pending task', () => {
    const ids = submitRequests(manager, [deleteRequest('/tmp/a'), unmountRequest('/mnt/b')])

    expect(ids).toHaveLength(2)
    expect(manager.getTasks().map(task => [task.id, task.description, task.status.state])).toEqual([
      [ids[0], 'Delete "a"', 'pending'],
      [ids[1], 'Unmount "/mnt/b"', 'pending']
    ])
  })
})
