import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ObjectId } from 'mongodb';
import { UserRecord, VerificationStatus } from '../interfaces/domain/Records';

@Entity({ name: 'users' })
export class User implements UserRecord {
  @ObjectIdColumn()
  _id!: ObjectId;

  @Index({ unique: true })
  @Column()
  userId!: string;

  @Index({ unique: true, sparse: true })
  @Column()
  primaryEmail?: string;

  @Column()
  alternateEmails!: string[];

  @Column({ nullable: true })
  phone!: string | null;

  @Column({ nullable: true })
  linkedin!: string | null;

  @Column({ nullable: true })
  name!: string | null;

  @Column()
  verificationStatus!: VerificationStatus;

  @Column()
  createdAt!: Date;

  @Column({ nullable: true })
  updatedAt!: Date | null;
}
