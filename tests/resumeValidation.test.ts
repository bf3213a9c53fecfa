import { missingSections, validateResumeData } from '../src/models/shared/resumeValidation';
import { SAMPLE_RESUME } from './support/fakes';

describe('validateResumeData', () => {
  it('accepts a complete resume', () => {
    expect(validateResumeData(SAMPLE_RESUME, 0.9)).toEqual({
      isValid: true,
      missingFields: [],
      validationErrors: [],
      confidenceScore: 0.9
    });
  });

  it('lists missing sections and incomplete entries', () => {
    const result = validateResumeData({
      personal_info: { name: 'Jane Doe' },
      skills: {},
      experience: [{ company: 'Acme' }],
      education: []
    });

    expect(result).toEqual({
      isValid: false,
      missingFields: ['skills', 'education'],
      validationErrors: ['Missing email in personal_info', 'Missing company/position in experience 1'],
      confidenceScore: 0
    });
  });
});

describe('missingSections', () => {
  it('treats empty objects and arrays as missing', () => {
    expect(missingSections({ personal_info: {}, experience: [] }, ['personal_info', 'skills', 'experience'])).toEqual([
      'personal_info',
      'skills',
      'experience'
    ]);
  });
});
