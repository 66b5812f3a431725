export { Rule, morphSpans } from './Rule';
export { ItalicsRule } from './ItalicsRule';
export { StrikethroughRule } from './StrikethroughRule';
export { HeaderRule } from './HeaderRule';
export { ListRule } from './ListRule';
export { LinkRule, escapeUrl } from './LinkRule';
export { ImageRule } from './ImageRule';
export { BacktickRule } from './BacktickRule';
export { EscapeUnderscoreRule } from './EscapeUnderscoreRule';
export { FirstLineHeaderRule } from './FirstLineHeaderRule';
export { findDelimitedSpans } from './delimiterPairs';
