/**
 * Renderer exports
 */

export {
  renderDocstring,
  renderSections,
  mergeSections,
  DEFAULT_SECTIONS,
  DEFAULT_DESCRIPTION_PLACEHOLDER,
  DEFAULT_EXAMPLES_PLACEHOLDER,
  type RenderOptions,
} from './renderer.js';
export { parseDocstring, readDocstring, cleanDocstring, splitEntry, SECTION_RANK } from './docstring-parser.js';
export { parseNotes, startsWithNote, type NoteContext } from './notes.js';
