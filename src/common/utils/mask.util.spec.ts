import { maskSensitive } from './mask.util';

describe('maskSensitive', () => {
  it('민감한 키를 대소문자 구분 없이 가린다', () => {
    expect(
      maskSensitive({ key: 'test-key', params: { API_KEY: 'test-key', page: 2 }, list: ['a'] }),
    ).toEqual({ key: '[masked]', params: { API_KEY: '[masked]', page: 2 }, list: ['a'] });
  });

  it('긴 문자열은 잘라낸다', () => {
    const masked = maskSensitive('x'.repeat(200));
    expect(masked).toBe(`${'x'.repeat(177)}...`);
  });
});
