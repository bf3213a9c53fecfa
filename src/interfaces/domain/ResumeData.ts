import { z } from 'zod';

const text = z.preprocess(
  value => (typeof value === 'number' ? String(value) : value),
  z.string().nullish()
);

// Models answer null for sections they did not find; treat it as absent
function absentWhenNull<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === null ? undefined : value), schema.optional());
}

const textList = z.preprocess(
  value => (Array.isArray(value) ? value.filter(item => item !== null && item !== undefined) : value),
  z.array(z.preprocess(value => (typeof value === 'string' ? value : JSON.stringify(value)), z.string()))
);

export const personalInfoSchema = z
  .object({
    name: text,
    email: text,
    phone: text,
    address: text,
    linkedin: text,
    github: text,
    portfolio: text,
    other_links: absentWhenNull(textList)
  })
  .passthrough();

export const skillsSchema = z
  .object({
    technical_skills: absentWhenNull(textList),
    soft_skills: absentWhenNull(textList),
    programming_languages: absentWhenNull(textList),
    frameworks: absentWhenNull(textList),
    tools: absentWhenNull(textList),
    databases: absentWhenNull(textList),
    certifications: absentWhenNull(textList)
  })
  .passthrough();

export const experienceSchema = z
  .object({
    company: text,
    position: text,
    location: text,
    start_date: text,
    end_date: text
  })
  .passthrough();

export const educationSchema = z
  .object({
    institution: text,
    degree: text,
    graduation_date: text
  })
  .passthrough();

// Shape the extraction prompts ask for. Unknown keys are kept as returned.
export const resumeDataSchema = z
  .object({
    personal_info: absentWhenNull(personalInfoSchema),
    professional_summary: text,
    skills: absentWhenNull(skillsSchema),
    experience: absentWhenNull(z.array(experienceSchema)),
    education: absentWhenNull(z.array(educationSchema)),
    projects: absentWhenNull(z.array(z.unknown())),
    achievements: absentWhenNull(z.array(z.unknown())),
    languages: absentWhenNull(z.array(z.unknown())),
    volunteer_experience: absentWhenNull(z.array(z.unknown()))
  })
  .passthrough();

export type PersonalInfo = z.infer<typeof personalInfoSchema>;
export type ResumeData = z.infer<typeof resumeDataSchema>;
