import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  ValidateIf,
  validateSync,
} from 'class-validator';

export const PERSISTENCE_MODES = ['supabase', 'memory'] as const;
export type PersistenceMode = (typeof PERSISTENCE_MODES)[number];

export const CMS_METHODS = ['local', 'aws', 'gcp', 'redis', 'memory'] as const;
export type CmsMethod = (typeof CMS_METHODS)[number];

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsIn(PERSISTENCE_MODES)
  PERSISTENCE: PersistenceMode = 'supabase';

  @ValidateIf((env: EnvironmentVariables) => env.PERSISTENCE === 'supabase')
  @IsUrl({ require_tld: false })
  SUPABASE_URL?: string;

  @ValidateIf((env: EnvironmentVariables) => env.PERSISTENCE === 'supabase')
  @IsString()
  SUPABASE_ANON_KEY?: string;

  @IsOptional()
  @IsString()
  SUPABASE_SERVICE_ROLE_KEY?: string;

  @IsString()
  @MinLength(16)
  CREDENTIALS_ENCRYPTION_SECRET!: string;

  @IsString()
  CORS_ORIGINS: string = '*';

  @IsIn(CMS_METHODS)
  CMS_METHOD: CmsMethod = 'local';

  @IsString()
  CMS_LOCAL_ROOT: string = './files';

  @IsString()
  CMS_STATIC_URL: string = '/api/v1/static';

  @ValidateIf((env: EnvironmentVariables) => env.CMS_METHOD === 'aws')
  @IsString()
  AWS_BUCKET?: string;

  @ValidateIf((env: EnvironmentVariables) => env.CMS_METHOD === 'aws')
  @IsString()
  AWS_REGION?: string;

  @IsOptional()
  @IsString()
  AWS_ACCESS_KEY_ID?: string;

  @IsOptional()
  @IsString()
  AWS_SECRET_ACCESS_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  AWS_ENDPOINT?: string;

  @ValidateIf((env: EnvironmentVariables) => env.CMS_METHOD === 'gcp')
  @IsString()
  GCP_PROJECT_ID?: string;

  @ValidateIf((env: EnvironmentVariables) => env.CMS_METHOD === 'gcp')
  @IsString()
  GCP_BUCKET?: string;

  @IsOptional()
  @IsString()
  GCP_KEY_FILENAME?: string;

  @IsString()
  REDIS_URL: string = 'redis://localhost:6379';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  CART_EXPIRY_DAYS: number = 30;

  @Type(() => Number)
  @IsInt()
  @Min(16)
  SMALL_IMAGE_SIZE: number = 350;

  @Type(() => Number)
  @IsInt()
  @Min(16)
  LARGE_IMAGE_SIZE: number = 900;
}

/**
 * Passed to ConfigModule.forRoot. Returns the typed, defaulted environment or
 * throws one error naming every invalid variable.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: false });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const problems = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return validated;
}
