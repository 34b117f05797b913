// tests/repo-scanner/scanner.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { RepoScanner } from '../../src/repo-scanner/scanner.js'

async function put(root: string, relativePath: string, content: string): Promise<string> {
  const full = join(root, ...relativePath.split('/'))
  await mkdir(join(full, '..'), { recursive: true })
  await writeFile(full, content)
  return full
}

describe('RepoScanner', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await realpath(await mkdtemp(join(tmpdir(), 'projmetrics-test-')))
    await put(tempDir, 'src/index.ts', 'export {}\n')
    await put(tempDir, 'src/util/math.py', 'x = 1\n')
    await put(tempDir, 'README.md', '# readme\n')
    await put(tempDir, '.env', 'KEY=test-secret\n')
    await put(tempDir, '.github/workflow.yml', 'on: push\n')
    await put(tempDir, 'node_modules/pkg/index.js', 'module.exports = 1\n')
    await put(tempDir, 'vendor/lib.c', 'int x;\n')
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('should list files sorted by relative path with default exclusions', async () => {
    const files = await new RepoScanner(tempDir).scanFiles()

    expect(files.map(f => f.relativePath)).toEqual([
      'README.md',
      'src/index.ts',
      'src/util/math.py',
      'vendor/lib.c'
    ])
    expect(files[1]).toEqual({
      path: join(tempDir, 'src', 'index.ts'),
      relativePath: 'src/index.ts',
      extension: '.ts',
      size: 10
    })
  })

  it('should include hidden files and directories when asked', async () => {
    const files = await new RepoScanner(tempDir, { includeHidden: true }).scanFiles()
    const paths = files.map(f => f.relativePath)

    expect(paths).toContain('.env')
    expect(paths).toContain('.github/workflow.yml')
    expect(paths).not.toContain('node_modules/pkg/index.js')
  })

  it('should honour extra and disabled default exclusions', async () => {
    const files = await new RepoScanner(tempDir, {
      defaultExcludes: false,
      excludeDirs: ['vendor']
    }).scanFiles()

    expect(files.map(f => f.relativePath)).toEqual([
      'README.md',
      'node_modules/pkg/index.js',
      'src/index.ts',
      'src/util/math.py'
    ])
  })

  it('should leave out injected self files and count them', async () => {
    const scanner = new RepoScanner(tempDir, {
      selfFiles: new Set([join(tempDir, 'src', 'index.ts')])
    })
    const files = await scanner.scanFiles()

    expect(files.map(f => f.relativePath)).not.toContain('src/index.ts')
    expect(scanner.getSelfExcludedCount()).toBe(1)
  })

  it('should match self files through symlinks', async () => {
    const target = await put(tempDir, 'tools/projmetrics.js', '// tool\n')
    await symlink(target, join(tempDir, 'run.js'))

    const scanner = new RepoScanner(tempDir, { selfFiles: new Set([target]) })
    const files = await scanner.scanFiles()
    const paths = files.map(f => f.relativePath)

    expect(paths).not.toContain('tools/projmetrics.js')
    expect(paths).not.toContain('run.js')
    expect(scanner.getSelfExcludedCount()).toBe(2)
  })

  it('should report dangling symlinks as soft skips and keep going', async () => {
    await symlink(join(tempDir, 'missing.ts'), join(tempDir, 'src', 'broken.ts'))
    const onSkip = vi.fn()

    const files = await new RepoScanner(tempDir, { onSkip }).scanFiles()

    expect(onSkip).toHaveBeenCalledTimes(1)
    expect(onSkip.mock.calls[0][0]).toBe(join(tempDir, 'src', 'broken.ts'))
    expect(onSkip.mock.calls[0][1]).toBeInstanceOf(Error)
    expect(files).toHaveLength(4)
  })

  it('should not descend into symlinked directories', async () => {
    await symlink(join(tempDir, 'src'), join(tempDir, 'linked-src'))
    const files = await new RepoScanner(tempDir).scanFiles()
    expect(files.map(f => f.relativePath).some(p => p.startsWith('linked-src'))).toBe(false)
  })
})
