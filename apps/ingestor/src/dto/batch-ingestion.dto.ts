import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * Omitting `path` ingests the configured BATCH_FILE_PATH. Otherwise `path`
 * is read relative to that file's directory and may not leave it.
 */
export class BatchIngestionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  path?: string;
}
