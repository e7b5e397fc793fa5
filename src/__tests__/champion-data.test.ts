import { ChampionDataService } from '../lcu/champion-data.js';

const DATA_URL = 'https://cdn.example.test/champions.json';

describe('ChampionDataService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('loads champions once per session', async () => {
    const fetchMock = jest.spyOn(global, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          Aatrox: {
            id: 266,
            key: 'Aatrox',
            name: 'Aatrox',
            title: 'the Darkin Blade',
            skins: [{ id: 266000, name: 'Original', isBase: true }],
          },
        })
      )
    );
    const service = new ChampionDataService(DATA_URL);

    const first = await service.load();
    await service.load();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(DATA_URL);
    expect(first.data).toEqual([
      { id: 266, key: 'Aatrox', name: 'Aatrox', skins: [{ id: 266000, name: 'Original', isBase: true }] },
    ]);
  });

  it('reports HTTP failures', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('unavailable', { status: 503 }));
    const service = new ChampionDataService(DATA_URL);

    await expect(service.load()).resolves.toEqual({
      success: false,
      status: 503,
      error: 'Failed to load champion data: HTTP 503',
    });
  });

  it('reports network failures', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    const result = await new ChampionDataService(DATA_URL).load();

    expect(result.error).toBe('Failed to load champion data: getaddrinfo ENOTFOUND');
  });
});
