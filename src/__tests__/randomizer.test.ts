import {
  eligibleTokenChallenges,
  pickRandom,
  randomizeChallengeTokens,
  randomizeProfileIcon,
  removeChallengeTokens,
} from '../cosmetics/randomizer.js';
import { createFakeLcu } from './helpers/fake-lcu.js';

const challengeMap = {
  '1': { id: 1, name: 'Alpha', currentLevel: 'GOLD' },
  '2': { id: 2, name: 'Beta', currentLevel: 'NONE' },
  '3': { id: 3, name: 'Gamma', currentLevel: 'SILVER' },
  '4': { id: 4, name: 'Delta', currentLevel: 'PLATINUM' },
  '5': { id: 5, name: 'Legacy', currentLevel: 'MASTER', isCapstone: true },
  '6': { id: 6, name: 'Epsilon', currentLevel: 'DIAMOND' },
};

describe('pickRandom', () => {
  it('takes the first entries when the source always returns 0', () => {
    expect(pickRandom([1, 2, 3, 4], 2, () => 0)).toEqual([1, 2]);
  });

  it('swaps from the end when the source is close to 1', () => {
    expect(pickRandom([1, 2, 3, 4], 2, () => 0.99)).toEqual([4, 1]);
  });

  it('returns every entry once when asking for more than exist', () => {
    const picked = pickRandom(['a', 'b', 'c'], 10);
    expect([...picked].sort()).toEqual(['a', 'b', 'c']);
  });

  it('leaves the input untouched', () => {
    const items = [1, 2, 3];
    pickRandom(items, 3, () => 0.99);
    expect(items).toEqual([1, 2, 3]);
  });
});

describe('challenge tokens', () => {
  it('skips unleveled and capstone challenges', () => {
    const eligible = eligibleTokenChallenges(Object.values(challengeMap));
    expect(eligible.map((c) => c.id)).toEqual([1, 3, 4, 6]);
  });

  it('sets three random tokens', async () => {
    const { client, requests } = createFakeLcu({
      'GET /lol-challenges/v1/challenges/local-player': { data: challengeMap },
      'POST /lol-challenges/v1/update-player-preferences/': { status: 204 },
    });

    const picked = await randomizeChallengeTokens(client, () => 0);

    expect(picked.map((c) => c.name)).toEqual(['Alpha', 'Gamma', 'Delta']);
    expect(requests[1].data).toEqual({ challengeIds: [1, 3, 4] });
  });

  it('clears the tokens', async () => {
    const { client, requests } = createFakeLcu({
      'POST /lol-challenges/v1/update-player-preferences/': { status: 204 },
    });

    await removeChallengeTokens(client);

    expect(requests[0].data).toEqual({ challengeIds: [] });
  });

  it('surfaces a failed update', async () => {
    const { client } = createFakeLcu({
      'POST /lol-challenges/v1/update-player-preferences/': { status: 400, data: { message: 'Bad Request' } },
    });

    await expect(removeChallengeTokens(client)).rejects.toThrow('LCU API Error: 400 Bad Request');
  });
});

describe('randomizeProfileIcon', () => {
  const summoner = { summonerId: 7, displayName: 'Tester', profileIconId: 29, summonerLevel: 100 };

  it('switches to another owned icon', async () => {
    const { client, requests } = createFakeLcu({
      'GET /lol-summoner/v1/current-summoner': { data: summoner },
      'GET /lol-inventory/v2/inventory/SUMMONER_ICON': {
        data: [{ itemId: 29 }, { itemId: 588 }, { itemId: 4567 }, { itemId: 588 }],
      },
      'PUT /lol-summoner/v1/current-summoner/icon': { data: {} },
    });

    const result = await randomizeProfileIcon(client, () => 0);

    expect(result).toEqual({ previousIconId: 29, profileIconId: 588 });
    expect(requests[2].data).toEqual({ profileIconId: 588 });
  });

  it('fails when the current icon is the only one owned', async () => {
    const { client } = createFakeLcu({
      'GET /lol-summoner/v1/current-summoner': { data: summoner },
      'GET /lol-inventory/v2/inventory/SUMMONER_ICON': { data: [{ itemId: 29 }] },
    });

    await expect(randomizeProfileIcon(client)).rejects.toThrow(
      'No other owned profile icon to switch to'
    );
  });
});
