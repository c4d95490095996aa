export { loadInputFile, parseInputFile, type InputFile } from './input-loader.js';
