export { isTextSample, looksLikeText } from './fs-helpers/binary-detect.js';
export {
  FragmentSplitter,
  LineBuffer,
  readLines,
} from './fs-helpers/readers/line-reader.js';
