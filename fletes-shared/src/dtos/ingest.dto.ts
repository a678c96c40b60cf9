import { ArrayMinSize, IsArray, IsObject } from 'class-validator';
import { IngestRow } from '../interfaces/ingest.interface';

/** Rows are checked column by column in the ingest normalizer */
export class IngestBatchDto {
  @IsArray()
  @ArrayMinSize(1)
  @IsObject({ each: true })
  rows!: IngestRow[];
}
