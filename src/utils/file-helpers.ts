// src/utils/file-helpers.ts
import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export class FileHelpers {
  /**
   * Ensure directory exists, creating missing ancestors
   */
  static ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  static isDirectory(dirPath: string): boolean {
    try {
      return fs.statSync(dirPath).isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Names of the files directly inside a directory, optionally filtered.
   * Symlinks are listed unless they point at a directory; a dangling link
   * is listed too and fails when read.
   */
  static getFiles(dirPath: string, pattern?: RegExp): string[] {
    const files = fs.readdirSync(dirPath, { withFileTypes: true })
      .filter(entry => entry.isFile() ||
        (entry.isSymbolicLink() && !FileHelpers.isDirectory(path.join(dirPath, entry.name))))
      .map(entry => entry.name)
      .sort();

    if (pattern) {
      return files.filter(f => pattern.test(f));
    }

    return files;
  }

  /**
   * Read a file as UTF-8, failing on bytes that are not valid UTF-8
   */
  static readTextFile(filePath: string): string {
    return FileHelpers.decodeUtf8(fs.readFileSync(filePath));
  }

  static decodeUtf8(bytes: Uint8Array): string {
    return utf8Decoder.decode(bytes);
  }

  static writeTextFile(filePath: string, content: string): void {
    fs.writeFileSync(filePath, content, 'utf-8');
  }
}
