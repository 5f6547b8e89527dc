import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * One row per (tenant, provider, environment)
 */
@Entity('provider_configs')
@Index(['tenantId', 'providerName', 'environment'], { unique: true })
@Index(['tenantId'])
export class ProviderConfigEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id', type: 'varchar', length: 128 })
  tenantId!: string;

  @Column({ name: 'provider_name', type: 'varchar', length: 64 })
  providerName!: string;

  @Column({ name: 'provider_id', type: 'integer' })
  providerId!: number;

  @Column({ type: 'varchar', length: 16 })
  environment!: string;

  @Column({ type: 'simple-json' })
  credentials!: Record<string, string>;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
