export {
  parseLocator,
  baseDirAnchor,
  effectiveRef,
  formatLocator,
  TREE_MARKER,
  BLOB_MARKER
} from './parser.js'
