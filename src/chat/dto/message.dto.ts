import { Type } from 'class-transformer';
import {
  IsArray,
  IsDefined,
  IsIn,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ERROR_MESSAGES } from '../../config/constants';
import type { ChatRole } from '../../openai/openai.constants';

export class HistoryItemDto {
  @IsIn(['user', 'assistant'])
  role!: ChatRole;

  @IsString()
  content!: string;
}

/**
 * DTO for incoming chat messages. Blank messages pass validation and are
 * rejected by ChatService with a specific error.
 */
export class ChatMessageDto {
  @IsDefined({ message: ERROR_MESSAGES.noMessage })
  @IsString()
  message!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HistoryItemDto)
  history?: HistoryItemDto[];
}
