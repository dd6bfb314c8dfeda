import { Entity, PrimaryColumn, Column, CreateDateColumn } from 'typeorm';

export enum Bucket {
  A = 'A',
  B = 'B',
}

@Entity('ab_assignments')
export class AbAssignment {
  @PrimaryColumn({ type: 'varchar' })
  deviceId!: string;

  @Column({ type: 'enum', enum: Bucket })
  bucket!: Bucket;

  @Column({ type: 'int' })
  canaryPercentage!: number;

  @CreateDateColumn()
  assignedAt!: Date;
}
