/**
 * Extractor registry keyed by file extension
 */

import type { DeclarationExtractor, ExtractorOptions, Language } from './base.js';
import { PythonExtractor } from './python.js';

export class ExtractorRegistry {
  private extractors: Map<Language, DeclarationExtractor> = new Map();
  private extensionMap: Map<string, DeclarationExtractor> = new Map();

  register(extractor: DeclarationExtractor): void {
    this.extractors.set(extractor.language, extractor);

    for (const ext of extractor.extensions) {
      this.extensionMap.set(ext.toLowerCase(), extractor);
    }
  }

  getByLanguage(language: Language): DeclarationExtractor | undefined {
    return this.extractors.get(language);
  }

  getByFilePath(filePath: string): DeclarationExtractor | undefined {
    return this.extensionMap.get(this.getExtension(filePath));
  }

  canParse(filePath: string): boolean {
    return this.getByFilePath(filePath)?.canParse(filePath) ?? false;
  }

  getExtensions(): string[] {
    return Array.from(this.extensionMap.keys());
  }

  /**
   * Get file extension (lowercase, without dot)
   */
  private getExtension(filePath: string): string {
    const match = filePath.match(/\.([^./\\]+)$/);
    return match?.[1]?.toLowerCase() ?? '';
  }
}

/**
 * Create a registry with the default extractors
 */
export function createDefaultRegistry(options: ExtractorOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  registry.register(new PythonExtractor(options));
  return registry;
}
