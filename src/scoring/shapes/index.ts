export type { JsonObject, RawRecord, ShapeMatcher } from './shape.js';
export { rulesArrayShape } from './rules-array.js';
export { nestedResultsShape } from './nested-results.js';
export { topLevelArrayShape } from './top-level-array.js';
export { flatCollectionShape } from './flat-collection.js';
export { groupedControlsShape } from './grouped-controls.js';
export { serviceMapShape } from './service-map.js';
export { fallbackListShape } from './fallback-list.js';

import type { ShapeMatcher } from './shape.js';
import { rulesArrayShape } from './rules-array.js';
import { nestedResultsShape } from './nested-results.js';
import { topLevelArrayShape } from './top-level-array.js';
import { flatCollectionShape } from './flat-collection.js';
import { groupedControlsShape } from './grouped-controls.js';
import { serviceMapShape } from './service-map.js';
import { fallbackListShape } from './fallback-list.js';

// Tried in order; the first match wins
export const allShapes: readonly ShapeMatcher[] = [
  rulesArrayShape,
  nestedResultsShape,
  topLevelArrayShape,
  flatCollectionShape,
  groupedControlsShape,
  serviceMapShape,
  fallbackListShape,
];
