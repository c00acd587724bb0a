export * from './lib/types';
export * from './lib/errors';
export { intakeConfig, type IntakeConfig } from './lib/config';
export { RuleRepository, type RuleTables, type FixRule, type RangeRule } from './lib/rule-repository';
export { FormatInferenceEngine, type FormatInferenceOptions } from './lib/format-inference';
export { RowDiagnosisEngine, MemorySink, type RowSink, type RowDiagnosis } from './lib/row-diagnosis';
export { LabelDiagnosisEngine, type LabelDiagnosis } from './lib/label-diagnosis';
export { CorrectionApplicator, type CorrectionResult, type DroppedRecord } from './lib/corrections';
export { ReportWriter, type DiagnosisFiles } from './lib/report-writer';
export { Submission, type SubmissionDiagnosis, type CorrectionReport } from './lib/submission';
