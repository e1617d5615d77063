import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, MaxLength, Min } from 'class-validator';

export class CreateCollectionDto {
  @ApiProperty({ description: 'Collection name.', example: 'versioned_docs' })
  @IsString()
  @Matches(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'name must start with a letter or underscore and contain only letters, digits and underscores' })
  @MaxLength(255)
  name!: string;

  @ApiPropertyOptional({ description: 'Vector dimension. Defaults to the embedding model dimension.', example: 1536 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(32768)
  dim?: number;

  @ApiPropertyOptional({ description: 'Free-form description stored with the collection.' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  description?: string;
}
