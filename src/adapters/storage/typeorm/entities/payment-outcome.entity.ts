import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

/**
 * Terminal payment outcomes; the unique index is what makes recording idempotent
 */
@Entity('payment_outcomes')
@Index(['tenantId', 'providerName', 'paymentId', 'status'], { unique: true })
@Index(['tenantId', 'paymentId'])
export class PaymentOutcomeEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id', type: 'varchar', length: 128 })
  tenantId!: string;

  @Column({ name: 'provider_name', type: 'varchar', length: 64 })
  providerName!: string;

  @Column({ name: 'payment_id', type: 'varchar', length: 128 })
  paymentId!: string;

  @Column({ type: 'varchar', length: 16 })
  status!: string;

  @Column({ name: 'transaction_id', type: 'varchar', length: 128, nullable: true })
  transactionId!: string | null;

  @Column({
    type: 'decimal',
    precision: 14,
    scale: 2,
    nullable: true,
    transformer: {
      to: (value: number | null | undefined) => value ?? null,
      from: (value: string | number | null) => (value === null ? null : Number(value)),
    },
  })
  amount!: number | null;

  @Column({ type: 'varchar', length: 3, nullable: true })
  currency!: string | null;

  @Column({ type: 'text', nullable: true })
  message!: string | null;

  @CreateDateColumn({ name: 'recorded_at' })
  recordedAt!: Date;
}
