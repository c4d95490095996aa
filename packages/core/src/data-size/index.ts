export {
  unarySize,
  binarySize,
  compareDataSize,
  dataSizeEquals,
  formatDataSize,
  distinctSizes,
  sizeSetsEqual,
  sizeComponents,
  type DataSize,
} from './data-size.js';
