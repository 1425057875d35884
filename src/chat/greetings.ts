const GREETINGS = new Set([
  'hi',
  'hello',
  'hey',
  'hi there',
  'hello there',
  'good morning',
  'good afternoon',
  'good evening',
  "what's up",
  'whats up',
  'sup',
  'yo',
]);

export const GREETING_RESPONSES = [
  'Hi there! 🚀 Ready to dive into crypto? Ask me about prices, analysis, or any coin!',
  "Hello! 📈 I'm your crypto research assistant. What would you like to know about the markets today?",
  'Hey! 💎 Looking for crypto insights? I can help with trading, DeFi, NFTs, and more!',
  "Hi! ⚡ What's on your crypto watchlist today? I'm here to help with analysis and data!",
  'Hello! 🌟 Ready to explore the crypto universe? Ask me anything about blockchain and digital assets!',
  'Hey there! 🔥 The crypto markets are always moving. What can I help you research today?',
  'Hi! 🎯 Your crypto research companion is here. Ask me about any coin, trend, or strategy!',
  "Hello! ⭐ From Bitcoin to DeFi, I've got you covered. What's your crypto question?",
];

export function isGreeting(message: string): boolean {
  const normalized = message
    .toLowerCase()
    .replace(/’/g, "'")
    .replace(/[!.?\s]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
  return GREETINGS.has(normalized);
}

export function pickGreeting(random: () => number = Math.random): string {
  const index = Math.floor(random() * GREETING_RESPONSES.length);
  return GREETING_RESPONSES[Math.min(index, GREETING_RESPONSES.length - 1)];
}
