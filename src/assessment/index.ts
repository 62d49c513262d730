/**
 * Assessment Module
 */

export { AssessmentAssembler, assessmentId, type AssemblyInput } from './AssessmentAssembler.js';
export { TC_FACTORS } from './AssessmentThresholds.js';
