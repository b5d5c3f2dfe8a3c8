/**
 * User Library Module Exports
 *
 * @module library
 */

export {
  parseBibtex,
  cleanBibtexValue,
  splitAuthors,
  BibtexParseError,
  type BibtexEntry,
} from './bibtex.js';

export {
  bibtexToLibraryEntry,
  parseBibtexLibrary,
  parseJsonLibrary,
  loadUserLibrary,
} from './loader.js';
