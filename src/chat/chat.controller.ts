import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Res,
  SetMetadata,
} from '@nestjs/common';
import type { Response } from 'express';
import { errorMessage } from '../common/utils/error.util';
import { ChatService } from './chat.service';
import { ChatMessageDto } from './dto/message.dto';
import { ChatStreamEvent } from './dto/chat-response.dto';

function writeEvent(res: Response, event: ChatStreamEvent): void {
  res.write(`data: ${JSON.stringify(event)}\n\n`);
}

@Controller('api/chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  @SetMetadata('response_message', 'Response generated.')
  @HttpCode(HttpStatus.OK)
  @Post()
  chat(@Body() dto: ChatMessageDto) {
    return this.chatService.processMessage(dto);
  }

  /**
   * Server-Sent Events. The first event is awaited before headers go out, so
   * validation and configuration errors still come back as JSON errors.
   */
  @Post('stream')
  async stream(@Body() dto: ChatMessageDto, @Res() res: Response) {
    const events = this.chatService.streamMessage(dto);
    const first = await events.next();

    res.status(HttpStatus.OK);
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    let closed = false;
    res.on('close', () => {
      closed = true;
    });

    try {
      if (!first.done) writeEvent(res, first.value);
      for await (const event of events) {
        // Leaving the loop returns the generator, which stops the model stream.
        if (closed) {
          this.logger.debug('Client disconnected mid-stream');
          break;
        }
        writeEvent(res, event);
      }
    } catch (err) {
      this.logger.error(`Stream error: ${errorMessage(err)}`);
      writeEvent(res, {
        error: errorMessage(err),
        statusCode:
          err instanceof HttpException
            ? err.getStatus()
            : HttpStatus.INTERNAL_SERVER_ERROR,
      });
    } finally {
      res.end();
    }
  }
}
