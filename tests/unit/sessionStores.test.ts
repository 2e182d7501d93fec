import { SessionResolutionStores } from '../../src/services/sessionStores';

describe('SessionResolutionStores', () => {
  let now: number;
  let sessions: SessionResolutionStores;

  beforeEach(() => {
    now = 1_000_000;
    sessions = new SessionResolutionStores(30, () => now);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('returns the same store for the same session', () => {
    expect(sessions.get('session-a')).toBe(sessions.get('session-a'));
    expect(sessions.size).toBe(1);
  });

  test('keeps sessions isolated', () => {
    sessions.get('session-a').setIgnored('E');

    expect(sessions.get('session-b').isIgnored('E')).toBe(false);
    expect(sessions.get('session-a').isIgnored('E')).toBe(true);
  });

  test('peek does not create a session', () => {
    expect(sessions.peek('session-a')).toBeUndefined();
    expect(sessions.size).toBe(0);
  });

  test('prune drops sessions idle past the TTL', () => {
    sessions.get('session-a');
    now += 10 * 60_000;
    sessions.get('session-b');
    now += 25 * 60_000;

    expect(sessions.prune()).toBe(1);
    expect(sessions.peek('session-a')).toBeUndefined();
    expect(sessions.peek('session-b')).toBeDefined();
  });

  test('access refreshes a session', () => {
    sessions.get('session-a');
    now += 20 * 60_000;
    sessions.get('session-a');
    now += 20 * 60_000;

    expect(sessions.prune()).toBe(0);
    expect(sessions.size).toBe(1);
  });
});
