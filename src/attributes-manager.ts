import fs, { type Dirent } from 'fs';
import path from 'path';
import { DiscoveryError } from './errors.js';
import { parseLine } from './pattern-codec.js';
import {
  ATTRIBUTES_FILE,
  type AttributesManager,
  type ParsedRuleLine,
  type PatternDescriptor
} from './types.js';

interface DiscoveredFile {
  file: string;
  depth: number;
  order: number;
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join('/');
}

export class FileSystemAttributesManager implements AttributesManager {
  /**
   * Every rule file that applies to the working tree, most specific first:
   * deeper `.gitattributes` files precede shallower ones (ties keep walk
   * order), and `<gitDir>/info/attributes` comes last.
   */
  findAttributeFiles(rootDir: string, gitDir: string): string[] {
    const discovered: DiscoveredFile[] = [];

    const walk = (dir: string, depth: number) => {
      let entries: Dirent[];
      try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
      } catch (error) {
        throw new DiscoveryError(dir, error);
      }

      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (entry.name === '.git') continue;
          walk(fullPath, depth + 1);
        } else if (entry.isFile() && entry.name === ATTRIBUTES_FILE) {
          discovered.push({ file: fullPath, depth, order: discovered.length });
        }
      }
    };

    walk(rootDir, 0);

    const files = discovered
      .sort((a, b) => b.depth - a.depth || a.order - b.order)
      .map(d => d.file);

    const repoAttributes = path.join(gitDir, 'info', 'attributes');
    if (fs.existsSync(repoAttributes) && fs.statSync(repoAttributes).isFile()) {
      files.push(repoAttributes);
    }

    return files;
  }

  readKnownPatterns(files: string[], rootDir: string): PatternDescriptor[] {
    const patterns: PatternDescriptor[] = [];

    for (const file of files) {
      let content: string;
      try {
        content = fs.readFileSync(file, 'utf-8');
      } catch {
        // Unreadable rule files don't stop the listing
        continue;
      }

      const source = toPosix(path.relative(rootDir, file));
      const scope = this.scopeOf(file, rootDir);

      for (const line of content.split('\n')) {
        const parsed: ParsedRuleLine | undefined = parseLine(line);
        if (!parsed) continue;

        patterns.push({
          path: scope === '' ? parsed.pattern : path.posix.join(scope, parsed.pattern),
          source,
          lockable: parsed.lockable
        });
      }
    }

    return patterns;
  }

  readRuleFile(filePath: string): string {
    if (!fs.existsSync(filePath)) {
      return '';
    }
    return fs.readFileSync(filePath, 'utf-8');
  }

  writeRuleFile(filePath: string, content: string): void {
    fs.writeFileSync(filePath, content);
  }

  /**
   * Tree-relative directory a rule file's patterns are anchored at. Files
   * outside the tree (the git dir's info/attributes) apply at the root.
   */
  private scopeOf(file: string, rootDir: string): string {
    const dir = toPosix(path.relative(rootDir, path.dirname(file)));
    const outside = dir === '..' || dir.startsWith('../') || path.isAbsolute(dir);
    if (dir === '' || outside || dir === '.git' || dir.startsWith('.git/')) {
      return '';
    }
    return dir;
  }
}
