import { Body, Controller, Get, HttpStatus, Inject, Param, Post, Query, Req } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import {
  CommissionInfo,
  InstallmentInfo,
  PaymentOrchestrationService,
  PaymentResponse,
  RateLimitAction,
  RefundResponse,
} from '../../../core';
import {
  CancelPaymentDto,
  CommissionInquiryDto,
  CreatePaymentDto,
  EnvironmentQueryDto,
  InstallmentInquiryDto,
  RefundPaymentDto,
} from '../../../_shared';
import { PAYMENT_ORCHESTRATION } from '../constants';
import { GatewayOperation, TenantId } from '../decorators';
import { buildOrchestrationContext } from './request-context';

/**
 * Payment Controller
 *
 * Canonical payment operations routed to the tenant's configured provider
 */
@ApiTags('Payments')
@Controller('payments')
export class PaymentController {
  constructor(
    @Inject(PAYMENT_ORCHESTRATION)
    private readonly orchestration: PaymentOrchestrationService,
  ) {}

  @Post(':provider')
  @GatewayOperation(RateLimitAction.PAYMENT, 'Create a payment (3D Secure when use3D is set)', HttpStatus.CREATED)
  async createPayment(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
    @Body() dto: CreatePaymentDto,
    @Req() request: Request,
  ): Promise<PaymentResponse> {
    const ctx = buildOrchestrationContext(request, tenantId, provider, query.environment);
    return this.orchestration.createPayment(ctx, { ...dto, clientIp: ctx.clientIp });
  }

  @Post(':provider/refund')
  @GatewayOperation(RateLimitAction.REFUND, 'Refund a payment, fully or partially')
  async refundPayment(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
    @Body() dto: RefundPaymentDto,
    @Req() request: Request,
  ): Promise<RefundResponse> {
    const ctx = buildOrchestrationContext(request, tenantId, provider, query.environment);
    return this.orchestration.refundPayment(ctx, dto);
  }

  @Post(':provider/installments')
  @GatewayOperation(RateLimitAction.STATUS, 'Installment options for an amount')
  async getInstallments(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
    @Body() dto: InstallmentInquiryDto,
    @Req() request: Request,
  ): Promise<InstallmentInfo> {
    const ctx = buildOrchestrationContext(request, tenantId, provider, query.environment);
    return this.orchestration.getInstallmentCount(ctx, dto);
  }

  @Post(':provider/commission')
  @GatewayOperation(RateLimitAction.STATUS, 'Processor commission for an amount')
  async getCommission(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
    @Body() dto: CommissionInquiryDto,
    @Req() request: Request,
  ): Promise<CommissionInfo> {
    const ctx = buildOrchestrationContext(request, tenantId, provider, query.environment);
    return this.orchestration.getCommission(ctx, dto);
  }

  @Get(':provider/:paymentId')
  @GatewayOperation(RateLimitAction.STATUS, 'Current status of a payment')
  async getPaymentStatus(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Param('paymentId') paymentId: string,
    @Query() query: EnvironmentQueryDto,
    @Req() request: Request,
  ): Promise<PaymentResponse> {
    const ctx = buildOrchestrationContext(request, tenantId, provider, query.environment);
    return this.orchestration.getPaymentStatus(ctx, { paymentId });
  }

  @Post(':provider/:paymentId/cancel')
  @GatewayOperation(RateLimitAction.PAYMENT, 'Cancel a payment')
  async cancelPayment(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Param('paymentId') paymentId: string,
    @Query() query: EnvironmentQueryDto,
    @Body() dto: CancelPaymentDto,
    @Req() request: Request,
  ): Promise<PaymentResponse> {
    const ctx = buildOrchestrationContext(request, tenantId, provider, query.environment);
    return this.orchestration.cancelPayment(ctx, { ...dto, paymentId });
  }
}
