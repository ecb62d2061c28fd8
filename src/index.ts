export * from './engine';
export { displayWidth, truncateDisplay, truncatePath, truncateWithRanges } from './shared/truncate';
export type { KeptRange, TruncateOptions, TruncatePosition, TruncatedText } from './shared/truncate';
export { graphemeWidth } from './shared/charWidth';
