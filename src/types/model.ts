/**
 * Signature model and docstring section types
 */

export type { SignatureModel, ModelParameter } from '../model/schema.js';

export type SectionName = 'Args' | 'Returns' | 'Raises' | 'Examples';

export interface DocstringEntry {
  /** Parameter name or exception type */
  name: string;
  type: string | null;
  /**
   * First line of the description followed by continuation lines, each
   * stored without the section's four-space indentation
   */
  description: string[];
}

export interface ReturnsEntry {
  type: string | null;
  description: string[];
}

export interface DocstringSections {
  summary: string[];
  args: DocstringEntry[];
  returns: ReturnsEntry | null;
  raises: DocstringEntry[];
  examples: string[] | null;
}
