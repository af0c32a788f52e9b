import { extractJsonObject, toStringList } from './json-extract.util';

describe('extractJsonObject', () => {
  it('앞뒤 설명 문장을 무시하고 객체를 읽는다', () => {
    const raw = 'Sure! Here is the JSON:\n{"genres": ["RPG"], "query": "space"}\nHope it helps.';
    expect(extractJsonObject(raw)).toEqual({ genres: ['RPG'], query: 'space' });
  });

  it('홑따옴표와 후행 쉼표는 JSON5로 해석한다', () => {
    expect(extractJsonObject("{'tags': ['co-op',], platforms: []}")).toEqual({
      tags: ['co-op'],
      platforms: [],
    });
  });

  it('객체가 없거나 해석할 수 없으면 null', () => {
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('{ this is not json }')).toBeNull();
  });
});

describe('toStringList', () => {
  it('문자열만 남기고 공백을 정리한다', () => {
    expect(toStringList([' RPG ', 3, '', 'Action'])).toEqual(['RPG', 'Action']);
    expect(toStringList('PC')).toEqual(['PC']);
    expect(toStringList(null)).toEqual([]);
  });
});
