const OUTPUT_SCHEMA = `{
  "personal_info": {
    "name": "full name",
    "email": "primary email address",
    "phone": "phone number with country code if available",
    "address": "city, state/country or full address",
    "linkedin": "LinkedIn profile URL",
    "github": "GitHub profile URL",
    "portfolio": "personal website URL",
    "other_links": ["other professional links"]
  },
  "professional_summary": "2-3 sentence summary or objective",
  "skills": {
    "technical_skills": [], "soft_skills": [], "programming_languages": [],
    "frameworks": [], "tools": [], "databases": [], "certifications": []
  },
  "experience": [{
    "company": "", "position": "", "location": "",
    "start_date": "YYYY-MM", "end_date": "YYYY-MM or Present", "duration": "",
    "description": "", "achievements": [], "technologies": [], "responsibilities": []
  }],
  "education": [{
    "institution": "", "degree": "", "location": "", "graduation_date": "YYYY-MM",
    "gpa": "", "relevant_coursework": [], "honors": []
  }],
  "projects": [{ "name": "", "description": "", "technologies": [], "url": "", "role": "", "outcomes": [] }],
  "achievements": [],
  "languages": [{ "language": "", "proficiency": "Native/Fluent/Intermediate/Basic" }],
  "volunteer_experience": [{ "organization": "", "role": "", "duration": "", "description": "" }]
}`;

const GUIDELINES = `Rules:
- Extract skills from every section, not only the skills section.
- Normalise dates to YYYY-MM; accept variants such as "Sept 2023" or "09/2023".
- Keep quantified achievements with their numbers.
- When several emails appear choose the most professional one as primary.
- Use null for values that are not present. Do not invent information.
- Return ONLY valid JSON without markdown formatting or commentary.`;

export const SYSTEM_PROMPT =
  'You are an ATS (Applicant Tracking System) resume parser that returns structured JSON.';

export function buildTextExtractionPrompt(resumeText: string): string {
  return `Extract all relevant information from the resume text below.

Output JSON with this structure:
${OUTPUT_SCHEMA}

${GUIDELINES}

Resume text:
"""
${resumeText}
"""`;
}

export function buildFileExtractionPrompt(): string {
  return `The attached document is a resume. Read the whole document including headers, footers, sidebars and multi-column layouts, and attach links to the section or role they belong to.

Output JSON with this structure:
${OUTPUT_SCHEMA}

${GUIDELINES}`;
}
