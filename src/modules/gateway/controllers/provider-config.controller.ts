import {
  Body,
  Controller,
  Delete,
  Get,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ConfigField, RateLimitAction } from '../../../core';
import {
  ApiGetProviderConfig,
  ApiProviderConfigFields,
  ApiSetProviderConfig,
  EnvironmentQueryDto,
  SetProviderConfigDto,
} from '../../../_shared';
import { GatewayOperation, TenantId } from '../decorators';
import { MaskedProviderConfig, ProviderConfigService } from '../services/provider-config.service';

/**
 * Provider Config Controller
 *
 * Tenant self-service for processor credentials
 */
@ApiTags('Configuration')
@Controller('config')
export class ProviderConfigController {
  constructor(private readonly providerConfigService: ProviderConfigService) {}

  @Get()
  @GatewayOperation(RateLimitAction.CONFIG, 'List registered providers and the tenant\'s configs')
  async list(@TenantId() tenantId: string): Promise<{
    providers: string[];
    configs: MaskedProviderConfig[];
  }> {
    return {
      providers: this.providerConfigService.listProviders(),
      configs: await this.providerConfigService.listTenantConfigs(tenantId),
    };
  }

  @Post(':provider')
  @GatewayOperation(RateLimitAction.CONFIG, 'Store provider credentials', HttpStatus.CREATED)
  @ApiSetProviderConfig()
  async setConfig(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Body() dto: SetProviderConfigDto,
  ): Promise<MaskedProviderConfig> {
    return this.providerConfigService.setConfig(tenantId, provider, dto.environment, dto.credentials);
  }

  @Get(':provider/fields')
  @GatewayOperation(RateLimitAction.CONFIG, 'Configuration fields a provider needs')
  @ApiProviderConfigFields()
  getFields(
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
  ): ConfigField[] {
    return this.providerConfigService.getRequiredConfig(provider, query.environment ?? 'sandbox');
  }

  @Get(':provider')
  @GatewayOperation(RateLimitAction.CONFIG, 'Read stored provider credentials')
  @ApiGetProviderConfig()
  async getConfig(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
    @Query() query: EnvironmentQueryDto,
  ): Promise<MaskedProviderConfig> {
    const environment = query.environment ?? 'sandbox';
    const config = await this.providerConfigService.getConfig(tenantId, provider, environment);
    if (!config) {
      throw new NotFoundException(`No ${provider} ${environment} configuration for this tenant`);
    }
    return config;
  }

  @Delete(':provider')
  @GatewayOperation(RateLimitAction.CONFIG, 'Delete provider credentials for every environment')
  async deleteConfig(
    @TenantId() tenantId: string,
    @Param('provider') provider: string,
  ): Promise<{ deleted: number }> {
    return { deleted: await this.providerConfigService.deleteConfig(tenantId, provider) };
  }
}
