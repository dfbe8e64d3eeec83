export {
  SetClassCatalog,
  setClassCatalog,
  vectorsEqual,
  MIN_CARDINALITY,
  MAX_CARDINALITY,
} from './setClassCatalog'
