import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { BaggagePriority } from '../baggage/baggage-priority.enum';

/**
 * Optional body for POST /tasks.
 *
 * Both fields override the randomly generated baggage details; an empty
 * body is valid and yields a fully random tag.
 */
export class SubmitTaskDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  destination?: string;

  @IsOptional()
  @IsEnum(BaggagePriority)
  priority?: BaggagePriority;
}
