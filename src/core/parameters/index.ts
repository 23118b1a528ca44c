export {
  splitGroupedName,
  fixFacetNames,
  fixGroupedNames,
  cleanParameterLabels,
  isIntercept,
  removeIntercept,
} from './naming';

export type { EffectsKind, ComponentKind, ParameterInfo } from './classification';
export { classifyParameters, indexClassification } from './classification';
