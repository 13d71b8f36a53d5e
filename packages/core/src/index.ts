/**
 * @reconciler/core — decision logic for job source reconciliation
 */

export {
  normalizeText,
  tokenize,
  extractSalaryRange,
  extractLocationTokens,
  normalizeSource,
  type NormalizedContent,
  type SalaryPeriod,
  type SalaryRange,
} from './normalize';
export {
  computeContentFingerprint,
  buildFeatureVector,
  prepareSource,
  shingle,
  SHINGLE_SIZE,
  type FeatureVector,
  type PreparedSource,
} from './fingerprint';
export {
  contentSimilarity,
  locationAgreement,
  salaryAgreement,
  scoreSimilarity,
  similarity,
  classifyDeltaStatus,
  type SimilarityBreakdown,
} from './similarity';
export {
  detectDuplicates,
  detectPreparedDuplicates,
  assignClusterIds,
  clusterIdFor,
  normalizeUrlForDedupe,
  type DetectDuplicatesOptions,
  type DuplicateDetectionResult,
  type PairScorer,
} from './dedupe';
export {
  analyzeDeltas,
  compareSources,
  diffFields,
  summarizeDeltas,
  hasResolvedPrimary,
  formatSalary,
  type DeltaAnalysis,
} from './delta';
export { analyzeCompanySources, emptyCompanyAnalytics } from './company-score';
export { generateSourceAnalysisReport } from './report';
export { classifySourceUrl, type SourceClassification, type SourcePlatform } from './platform';
export {
  createReconcilerConfig,
  platformReliabilityOf,
  ConfigurationError,
  DEFAULT_RECONCILER_CONFIG,
  DEFAULT_PLATFORM_RELIABILITY,
  reconcilerConfigSchema,
  type ReconcilerConfig,
  type ReconcilerConfigOverrides,
  type SimilarityWeights,
  type DuplicateDetectionConfig,
  type DeltaBands,
  type CompanyScoreConfig,
  type ClusteringMode,
} from './config';
