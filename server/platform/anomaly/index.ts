export { AnomalyDetector, createAnomalyDetector, type DetectorConfig, type AnomalyAssessment, type CreateDetectorOptions } from './anomaly-detector';
export {
  ANOMALY_LEVEL,
  CANONICAL_RULES,
  CORRELATION_CHANGE,
  EXTENDED_RULES,
  FORECAST_ERROR,
  INPUT_DOMAIN,
  OUTPUT_DOMAIN,
  VARIANCE_CHANGE,
  createInputVariables,
  createOutputVariable,
  createRuleBase,
  type AnomalyLabel,
  type RuleSetName,
} from './default-config';
export { InferenceEngine, DEFAULT_ENGINE_OPTIONS, type InferenceEngineOptions } from './fuzzy/inference-engine';
export { LinguisticVariable } from './fuzzy/linguistic-variable';
export { createFuzzySet, degree, peakOf, trapezoidal, triangular } from './fuzzy/membership';
export { RuleBase, and, or, term, evaluateAntecedent, firingStrength, collectTerms } from './fuzzy/rule-base';
export {
  UNDETERMINED_LABEL,
  type Antecedent,
  type Domain,
  type EvaluationResult,
  type FuzzifiedInputs,
  type FuzzySet,
  type MembershipShape,
  type Rule,
  type RuleDefinition,
  type RuleFiring,
  type UncoveredPolicy,
} from './fuzzy/types';
export {
  computeWindowIndicators,
  correlationChange,
  forecastError,
  varianceChange,
  type WindowIndicators,
} from './indicators/window-indicators';
