import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ObjectId } from 'mongodb';
import { SessionRecord } from '../interfaces/domain/Records';

@Entity({ name: 'sessions' })
export class Session implements SessionRecord {
  @ObjectIdColumn()
  _id!: ObjectId;

  @Index({ unique: true })
  @Column()
  sessionId!: string;

  @Index()
  @Column()
  userId!: string;

  @Column({ nullable: true })
  extractedEmail!: string | null;

  @Column()
  ipAddress!: string;

  @Column()
  status!: 'active' | 'expired';

  @Column()
  createdAt!: Date;

  @Column()
  expiresAt!: Date;
}
