import { HttpException, Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { allowedOrigins } from '../config/app.config';
import { errorMessage } from '../common/utils/error.util';
import { ChatService } from './chat.service';
import { ChatMessageDto } from './dto/message.dto';

@WebSocketGateway({
  namespace: '/chat',
  cors: {
    origin: allowedOrigins(),
    credentials: true,
  },
})
export class ChatGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(ChatGateway.name);

  constructor(private readonly chatService: ChatService) {}

  handleConnection(client: Socket) {
    this.logger.log(`Client connected: ${client.id}`);
    client.emit('connection:success', {
      clientId: client.id,
      message: 'Connected to crypto research assistant',
      timestamp: new Date().toISOString(),
    });
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage('chat:message')
  async handleChatMessage(
    @MessageBody() dto: ChatMessageDto | undefined,
    @ConnectedSocket() client: Socket,
  ) {
    client.emit('chat:typing', { isTyping: true });

    try {
      const response = await this.chatService.processMessage(dto);
      client.emit('chat:response', response);
    } catch (error) {
      this.logger.error(`Error processing message: ${errorMessage(error)}`);
      client.emit('chat:error', {
        message:
          error instanceof HttpException
            ? error.message
            : 'Sorry, I encountered an error. Please try again.',
        timestamp: new Date().toISOString(),
      });
    } finally {
      client.emit('chat:typing', { isTyping: false });
    }
  }

  /** Streams deltas as `chat:chunk`, then `chat:done`. */
  @SubscribeMessage('chat:stream')
  async handleChatStream(
    @MessageBody() dto: ChatMessageDto | undefined,
    @ConnectedSocket() client: Socket,
  ) {
    try {
      for await (const event of this.chatService.streamMessage(dto)) {
        client.emit('content' in event ? 'chat:chunk' : 'chat:done', event);
      }
    } catch (error) {
      this.logger.error(`Error streaming message: ${errorMessage(error)}`);
      client.emit('chat:error', {
        message:
          error instanceof HttpException
            ? error.message
            : 'Sorry, I encountered an error. Please try again.',
        timestamp: new Date().toISOString(),
      });
    }
  }
}
