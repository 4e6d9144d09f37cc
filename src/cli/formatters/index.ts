export {
  HumanFormatterBase,
  HumanVerificationFormatter,
  HumanCreationFormatter,
  VERIFICATION_ICONS,
  CREATION_ICONS,
  statusIcon,
} from './human.js';
export { JsonFormatter } from './json.js';
export type { JsonReport, JsonGroupReport, JsonOutcome } from './json.js';
export { HumanPresenter, JsonPresenter } from './presenters.js';
export type { CommandPresenter } from './presenters.js';
export type { CommandKind, FormatOptions, IFormatter } from './types.js';
