export { assemblePath, replayPath } from './pathAssembler';
export type { PathSink } from './pathAssembler';
export { toSvgPathData, DEFAULT_SVG_PRECISION } from './svgPath';
