import { BadRequestException } from '@nestjs/common';
import { CryptoIdPipe } from './crypto-id.pipe';

describe('CryptoIdPipe', () => {
  const pipe = new CryptoIdPipe();

  it('normalizes case and surrounding whitespace', () => {
    expect(pipe.transform(' Avalanche-2 ')).toBe('avalanche-2');
  });

  it.each(['', '../global', 'bit coin', 'btc?x=1'])('rejects %p', (id) => {
    expect(() => pipe.transform(id)).toThrow(
      new BadRequestException('Invalid crypto ID'),
    );
  });
});
