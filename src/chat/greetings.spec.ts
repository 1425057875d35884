import { GREETING_RESPONSES, isGreeting, pickGreeting } from './greetings';

describe('greetings', () => {
  it.each(['hi', 'Hello!', '  good evening. ', 'What’s up?', 'hi  there'])(
    'treats %p as a greeting',
    (message) => {
      expect(isGreeting(message)).toBe(true);
    },
  );

  it.each(['hi, what is bitcoin?', 'hello world', 'yo btc', 'hey there'])(
    'does not treat %p as a greeting',
    (message) => {
      expect(isGreeting(message)).toBe(false);
    },
  );

  it('picks a response by the random source', () => {
    expect(pickGreeting(() => 0)).toBe(GREETING_RESPONSES[0]);
    expect(pickGreeting(() => 0.999)).toBe(
      GREETING_RESPONSES[GREETING_RESPONSES.length - 1],
    );
  });
});
