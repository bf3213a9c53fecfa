import { MongoServerError } from 'mongodb';
import { DataSource } from 'typeorm';
import { Resume } from '../entities/Resume';
import { Session } from '../entities/Session';
import { User } from '../entities/User';
import { ResumeRecord, SessionRecord, UserRecord } from '../interfaces/domain/Records';
import { DuplicateUserError, ResumeStore } from './resumeStore';

const DUPLICATE_KEY_CODE = 11000;

function withoutObjectId<T extends { _id: unknown }>(entity: T): Omit<T, '_id'> {
  const { _id, ...record } = entity;
  return record;
}

export class MongoResumeStore implements ResumeStore {
  constructor(private readonly dataSource: DataSource) {}

  // Resolved per call: repositories need an initialized data source
  private get users() {
    return this.dataSource.getMongoRepository(User);
  }

  private get sessions() {
    return this.dataSource.getMongoRepository(Session);
  }

  private get resumes() {
    return this.dataSource.getMongoRepository(Resume);
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const user = await this.users.findOneBy({ primaryEmail: email });
    return user ? withoutObjectId(user) : null;
  }

  async createUser(user: UserRecord): Promise<void> {
    try {
      await this.users.save(this.users.create(user));
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE && user.primaryEmail) {
        throw new DuplicateUserError(user.primaryEmail);
      }
      throw error;
    }
  }

  async createSession(session: SessionRecord): Promise<void> {
    await this.sessions.save(this.sessions.create(session));
  }

  async saveResume(resume: ResumeRecord): Promise<void> {
    await this.resumes.save(this.resumes.create(resume));
  }

  async findResume(resumeId: string): Promise<ResumeRecord | null> {
    const resume = await this.resumes.findOneBy({ resumeId });
    return resume ? withoutObjectId(resume) : null;
  }

  async listResumesByUser(userId: string): Promise<ResumeRecord[]> {
    const resumes = await this.resumes.find({
      where: { userId },
      order: { createdAt: 'DESC' }
    });
    return resumes.map(withoutObjectId);
  }

  async deleteResume(resumeId: string): Promise<boolean> {
    const result = await this.resumes.deleteOne({ resumeId });
    return result.deletedCount > 0;
  }
}
