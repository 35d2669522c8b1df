import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class SshTargetDto {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  port?: number = 22;

  @IsString()
  @IsNotEmpty()
  username!: string;

  @IsString()
  @IsOptional()
  password?: string;

  @IsString()
  @IsOptional()
  privateKey?: string;
}

export class PushFileDto {
  @IsString()
  @IsNotEmpty()
  sourcePath!: string;

  @IsString()
  @IsNotEmpty()
  destinationPath!: string;

  @ValidateNested()
  @Type(() => SshTargetDto)
  target!: SshTargetDto;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  blockSize?: number;
}
