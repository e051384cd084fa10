import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import path from 'path'
import fs from 'fs'
import { FileSystemAttributesManager } from '../../src/attributes-manager.js'
import { DiscoveryError } from '../../src/errors.js'
import { cleanupTestTree, createFile, createTestTree } from '../helpers.js'

const PSD = '*.psd filter=lfs diff=lfs merge=lfs -text\n'
const PSD_LOCKABLE = '*.psd filter=lfs diff=lfs merge=lfs -text lockable\n'

describe('FileSystemAttributesManager', () => {
  let rootDir: string
  let gitDir: string
  const manager = new FileSystemAttributesManager()

  beforeEach(() => {
    rootDir = createTestTree()
    gitDir = path.join(rootDir, '.git')
  })

  afterEach(() => {
    cleanupTestTree(rootDir)
  })

  describe('findAttributeFiles', () => {
    it('should order deeper rule files first and the repository file last', () => {
      createFile(rootDir, '.gitattributes', PSD)
      createFile(rootDir, 'a/.gitattributes', PSD)
      createFile(rootDir, 'a/b/.gitattributes', PSD)
      createFile(rootDir, 'c/.gitattributes', PSD)
      createFile(rootDir, '.git/info/attributes', PSD)

      expect(manager.findAttributeFiles(rootDir, gitDir)).toEqual([
        path.join(rootDir, 'a/b/.gitattributes'),
        path.join(rootDir, 'a/.gitattributes'),
        path.join(rootDir, 'c/.gitattributes'),
        path.join(rootDir, '.gitattributes'),
        path.join(gitDir, 'info/attributes')
      ])
    })

    it('should skip a missing or non-file repository attributes entry', () => {
      createFile(rootDir, '.gitattributes', PSD)
      expect(manager.findAttributeFiles(rootDir, gitDir)).toEqual([path.join(rootDir, '.gitattributes')])

      fs.mkdirSync(path.join(gitDir, 'info', 'attributes'))
      expect(manager.findAttributeFiles(rootDir, gitDir)).toEqual([path.join(rootDir, '.gitattributes')])
    })

    it('should only collect files with the reserved name', () => {
      createFile(rootDir, 'docs/gitattributes', PSD)
      createFile(rootDir, 'docs/.gitattributes.bak', PSD)
      fs.mkdirSync(path.join(rootDir, 'lib', '.gitattributes'), { recursive: true })

      expect(manager.findAttributeFiles(rootDir, gitDir)).toEqual([])
    })

    it('should fail when the tree cannot be walked', () => {
      const missing = path.join(rootDir, 'does-not-exist')
      expect(() => manager.findAttributeFiles(missing, gitDir)).toThrow(DiscoveryError)
    })
  })

  describe('readKnownPatterns', () => {
    it('should prefer the subdirectory declaration of a pattern', () => {
      createFile(rootDir, '.gitattributes', PSD)
      createFile(rootDir, 'sub/.gitattributes', PSD_LOCKABLE)

      const files = manager.findAttributeFiles(rootDir, gitDir)
      expect(manager.readKnownPatterns(files, rootDir)).toEqual([
        { path: 'sub/*.psd', source: 'sub/.gitattributes', lockable: true },
        { path: '*.psd', source: '.gitattributes', lockable: false }
      ])
    })

    it('should scope repository attributes at the tree root', () => {
      createFile(rootDir, '.git/info/attributes', '*.bin filter=lfs diff=lfs merge=lfs -text\n')

      const files = manager.findAttributeFiles(rootDir, gitDir)
      expect(manager.readKnownPatterns(files, rootDir)).toEqual([
        { path: '*.bin', source: '.git/info/attributes', lockable: false }
      ])
    })

    it('should keep duplicates and ignore other lines', () => {
      createFile(rootDir, '.gitattributes', `${PSD}*.txt text\n# note\n${PSD}`)

      expect(manager.readKnownPatterns([path.join(rootDir, '.gitattributes')], rootDir)).toEqual([
        { path: '*.psd', source: '.gitattributes', lockable: false },
        { path: '*.psd', source: '.gitattributes', lockable: false }
      ])
    })

    it('should skip rule files that cannot be read', () => {
      createFile(rootDir, '.gitattributes', PSD)
      const files = [path.join(rootDir, 'gone/.gitattributes'), path.join(rootDir, '.gitattributes')]

      expect(manager.readKnownPatterns(files, rootDir)).toEqual([
        { path: '*.psd', source: '.gitattributes', lockable: false }
      ])
    })
  })

  describe('rule file io', () => {
    it('should read a missing rule file as empty', () => {
      expect(manager.readRuleFile(path.join(rootDir, '.gitattributes'))).toBe('')
    })

    it('should write the rule file contents verbatim', () => {
      const filePath = path.join(rootDir, '.gitattributes')
      manager.writeRuleFile(filePath, PSD)
      expect(manager.readRuleFile(filePath)).toBe(PSD)
    })
  })
})
