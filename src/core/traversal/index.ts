export { expand, expandInputs, collectCandidates, collectGroupCandidates, STDIN_LABEL } from './expander.js';
export { walkDirectory } from './walker.js';
export { parsePathList, readPathsFromStdin } from './stdin.js';
export type { PathListSource } from './stdin.js';
export type {
  InputSource,
  InputGroup,
  ExpandedInputs,
  CandidateList,
  WalkOptions,
  ExpandOptions,
} from './types.js';
