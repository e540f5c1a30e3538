import { loadSettings } from './configuration';

describe('loadSettings', () => {
  it('should fall back to defaults', () => {
    expect(loadSettings({})).toEqual({
      port: 3000,
      questionsFile: 'data/questions.json',
      sessionTtlMinutes: 120,
      shuffleOptions: true,
      botToken: undefined,
    });
  });

  it('should read values from the environment', () => {
    expect(
      loadSettings({
        PORT: '8080',
        QUESTIONS_FILE: '/srv/quiz/questions.json',
        SESSION_TTL_MINUTES: '30',
        SHUFFLE_OPTIONS: 'off',
        BOT_TOKEN: ' test-token ',
      }),
    ).toEqual({
      port: 8080,
      questionsFile: '/srv/quiz/questions.json',
      sessionTtlMinutes: 30,
      shuffleOptions: false,
      botToken: 'test-token',
    });
  });

  it('should treat blank values as unset', () => {
    expect(loadSettings({ PORT: '  ', BOT_TOKEN: '' })).toMatchObject({ port: 3000, botToken: undefined });
  });

  it('should reject malformed values', () => {
    expect(() => loadSettings({ PORT: 'abc' })).toThrow('PORT must be a positive integer, got "abc"');
    expect(() => loadSettings({ SESSION_TTL_MINUTES: '0' })).toThrow(
      'SESSION_TTL_MINUTES must be a positive integer, got "0"',
    );
    expect(() => loadSettings({ SHUFFLE_OPTIONS: 'maybe' })).toThrow(
      'SHUFFLE_OPTIONS must be true or false, got "maybe"',
    );
  });
});
