import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsArray,
  IsDefined,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { SCHEMA_TYPES, SchemaType } from '../seo-optimizer/seo-optimizer.constants';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

// Only numeric strings become numbers; booleans and other types are left for @IsInt to reject.
const numericString = ({ value }: { value: unknown }) =>
  typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value) ? Number(value) : value;

export class OptimizeContentDto {
  @ApiProperty({
    description: 'HTML fragment or document to optimize',
    example: '<h1>Test</h1><p>Short content about testing.</p>',
  })
  @IsDefined()
  @IsString()
  @IsNotEmpty()
  html_code!: string;

  @ApiProperty({ description: 'Focus keyword the content is optimized for', example: 'testing' })
  @Transform(trim)
  @IsDefined()
  @IsString()
  @IsNotEmpty()
  @Matches(/[\p{L}\p{N}]/u)
  focus_keyword!: string;

  @ApiProperty({ description: 'Current SEO score, reported back as the "before" score', example: 65 })
  @Transform(numericString)
  @IsDefined()
  @IsInt()
  @Min(0)
  @Max(100)
  seo_score!: number;

  @ApiPropertyOptional({ type: [String], default: ['Blog'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  categories?: string[];

  @ApiPropertyOptional({ type: [String], default: [] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @ApiPropertyOptional({ description: 'Featured image URL used for Open Graph and schema markup' })
  @IsOptional()
  @IsString()
  image?: string;

  @ApiPropertyOptional({ enum: SCHEMA_TYPES, default: 'Article' })
  @IsOptional()
  @IsIn([...SCHEMA_TYPES])
  schema?: SchemaType;
}

export class OptimizeResponseData {
  @ApiProperty() seo_score_before!: number;
  @ApiProperty() seo_score_after!: number;
  @ApiProperty() improvement!: number;
  @ApiProperty() optimized_html_wordpress!: string;
  @ApiProperty({ description: 'Keyword density in percent' }) keyword_density!: number;
  @ApiProperty() title_length!: number;
  @ApiProperty() meta_length!: number;
  @ApiProperty({ type: [String] }) optimizations!: string[];
}

export class OptimizeResponse {
  @ApiProperty({ example: true }) success!: true;
  @ApiProperty({ type: OptimizeResponseData }) data!: OptimizeResponseData;
}
