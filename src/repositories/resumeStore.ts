import { ResumeRecord, SessionRecord, UserRecord } from '../interfaces/domain/Records';

export interface ResumeStore {
  findUserByEmail(email: string): Promise<UserRecord | null>;
  createUser(user: UserRecord): Promise<void>;
  createSession(session: SessionRecord): Promise<void>;
  saveResume(resume: ResumeRecord): Promise<void>;
  findResume(resumeId: string): Promise<ResumeRecord | null>;
  /** Newest first. */
  listResumesByUser(userId: string): Promise<ResumeRecord[]>;
  deleteResume(resumeId: string): Promise<boolean>;
}

/** Raised by `createUser` when a user with the same primary email exists. */
export class DuplicateUserError extends Error {
  constructor(email: string) {
    super(`User with email ${email} already exists`);
    this.name = 'DuplicateUserError';
  }
}
