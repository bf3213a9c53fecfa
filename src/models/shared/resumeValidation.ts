import { ResumeData } from '../../interfaces/domain/ResumeData';
import { ResumeValidationResult } from '../../interfaces/domain/ResumeValidation';

export const REQUIRED_SECTIONS = ['personal_info', 'skills', 'experience', 'education'] as const;
export type ResumeSection = typeof REQUIRED_SECTIONS[number];

export function isSectionPresent(data: ResumeData, section: ResumeSection): boolean {
  const value = data[section];
  if (value === undefined || value === null) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return Object.keys(value).length > 0;
}

export function missingSections(data: ResumeData, sections: readonly ResumeSection[]): ResumeSection[] {
  return sections.filter(section => !isSectionPresent(data, section));
}

export function validateResumeData(data: ResumeData, confidence = 0): ResumeValidationResult {
  const missingFields: string[] = missingSections(data, REQUIRED_SECTIONS);
  const validationErrors: string[] = [];

  if (data.personal_info) {
    if (!data.personal_info.name) {
      validationErrors.push('Missing name in personal_info');
    }
    if (!data.personal_info.email) {
      validationErrors.push('Missing email in personal_info');
    }
  }

  (data.experience ?? []).forEach((entry, index) => {
    if (!entry.company || !entry.position) {
      validationErrors.push(`Missing company/position in experience ${index + 1}`);
    }
  });

  (data.education ?? []).forEach((entry, index) => {
    if (!entry.institution || !entry.degree) {
      validationErrors.push(`Missing institution/degree in education ${index + 1}`);
    }
  });

  return {
    isValid: missingFields.length === 0 && validationErrors.length === 0,
    missingFields,
    validationErrors,
    confidenceScore: confidence
  };
}
