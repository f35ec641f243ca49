import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';

export const SELF_SERVICE_ROLES = ['student', 'shop_owner'] as const;
export type SelfServiceRole = (typeof SELF_SERVICE_ROLES)[number];

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class RegisterDto {
  @IsEmail()
  @Transform(trim)
  email!: string;

  @IsString()
  @MinLength(6)
  password!: string;

  @IsString()
  @Transform(trim)
  @MinLength(1)
  @MaxLength(120)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(32)
  phone?: string;

  @IsIn(SELF_SERVICE_ROLES)
  role!: SelfServiceRole;

  // shop_owner only
  @IsOptional()
  @IsString()
  @Transform(trim)
  @MaxLength(120)
  restaurantName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  address?: string;

  @IsOptional()
  @IsString()
  @MaxLength(60)
  cuisineType?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsNumber()
  latitude?: number;

  @IsOptional()
  @IsNumber()
  longitude?: number;
}
