import { ResumeData, resumeDataSchema } from '../interfaces/domain/ResumeData';

/**
 * Pulls the outermost JSON object out of a model reply (tolerating code
 * fences or prose around it) and validates it as resume data.
 */
export function parseResumeJson(content: string): ResumeData {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('No JSON object found in model response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch (error) {
    throw new Error(`Model response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = resumeDataSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Model response does not match resume schema at '${issue.path.join('.')}': ${issue.message}`);
  }
  return result.data;
}
