export {
  AssessPatientUseCase,
  createAssessPatientUseCase,
  parsePatientProfile,
  parseScalingOptions,
  type AssessPatientDeps,
} from './AssessPatientUseCase.js';
