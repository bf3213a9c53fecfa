export interface ResumeValidationResult {
  isValid: boolean;
  missingFields: string[];
  validationErrors: string[];
  confidenceScore: number;
}
