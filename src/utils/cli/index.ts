import { formatHelp, displayVersion, displayError, type PackageInfo } from './cli-display';
import { display, displayBox, createDisplayBox, formatLabelValue } from './display';

export {
  formatHelp,
  displayVersion,
  displayError,
  display,
  displayBox,
  createDisplayBox,
  formatLabelValue,
  type PackageInfo,
};
