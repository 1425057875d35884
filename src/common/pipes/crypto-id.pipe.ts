import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { ERROR_MESSAGES } from '../../config/constants';

const CRYPTO_ID_PATTERN = /^[a-z0-9-]{1,100}$/;

/** CoinGecko ids are lowercase slugs such as "bitcoin" or "avalanche-2". */
@Injectable()
export class CryptoIdPipe implements PipeTransform<string, string> {
  transform(value: string): string {
    const id = String(value ?? '').trim().toLowerCase();
    if (!CRYPTO_ID_PATTERN.test(id)) {
      throw new BadRequestException(ERROR_MESSAGES.invalidCryptoId);
    }
    return id;
  }
}
