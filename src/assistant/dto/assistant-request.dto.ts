/**
 * Assistant Request DTOs
 */

import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class AskRequestDto {
  @IsString()
  @IsNotEmpty()
  declare question: string;

  @IsOptional()
  @IsBoolean()
  declare includeSources?: boolean;
}

export class SearchRequestDto {
  @IsString()
  @IsNotEmpty()
  declare query: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare k?: number;
}

export class ChatRequestDto {
  @IsString()
  @IsNotEmpty()
  declare message: string;
}

export class LoadDocumentsRequestDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  declare path?: string;
}

export class AddDocumentRequestDto {
  @IsString()
  @IsNotEmpty()
  declare path: string;
}

export class RemoveDocumentRequestDto {
  @IsString()
  @IsNotEmpty()
  declare sourceFile: string;
}
