/**
 * 자연어 질의에서 검색어와 장르/플랫폼/태그를 뽑는 프롬프트
 */
export function buildExtractTermsPrompt(text: string): string {
  return `Extract video game search criteria from the user's request.
Reply with one JSON object with these keys and nothing else:
  "query": short free-text search words left after removing the criteria (may be empty),
  "genres": list of genres, "platforms": list of platforms, "tags": list of descriptive tags.
Do not put prices or years in any list.

Request: "cozy farming sim for switch"
{"query": "farming", "genres": ["Simulation"], "platforms": ["Nintendo Switch"], "tags": ["cozy"]}

Request: "open world shooter on xbox with co-op under $30"
{"query": "", "genres": ["Shooter"], "platforms": ["Xbox One"], "tags": ["open world", "co-op"]}

Request: ${JSON.stringify(text)}
`;
}
