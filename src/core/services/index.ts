export * from './payment-orchestration.service';
