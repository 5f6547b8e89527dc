import { IsIn, IsObject, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { ENVIRONMENT_VALUES } from './payment.dto';

/**
 * DTO for storing a tenant's provider credentials
 */
export class SetProviderConfigDto {
  @ApiProperty({ enum: ENVIRONMENT_VALUES, example: 'sandbox' })
  @IsString()
  @IsIn(ENVIRONMENT_VALUES)
  environment!: string;

  @ApiProperty({
    description: 'Credential map; keys are listed by GET /config/:provider/fields',
    example: { secretKey: 'sk_test_placeholder_key' },
  })
  @IsObject()
  credentials!: Record<string, string>;
}
