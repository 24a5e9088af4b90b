import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z0-9_-]+$/, {
    message: 'collection may only contain letters, digits, "_" and "-"',
  })
  collection?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  top_k?: number;
}
