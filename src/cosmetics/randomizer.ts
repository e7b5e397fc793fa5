/**
 * Cosmetic Randomizer
 * Random challenge tokens and profile icons
 */

import type { LcuClient } from '../lcu/client.js';
import type { Challenge } from '../lcu/schemas.js';

export const MAX_CHALLENGE_TOKENS = 3;

export type RandomSource = () => number;

/**
 * Pick `n` distinct entries (partial Fisher-Yates on a copy)
 */
export function pickRandom<T>(items: readonly T[], n: number, random: RandomSource = Math.random): T[] {
  const pool = [...items];
  const count = Math.min(Math.max(n, 0), pool.length);

  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, count);
}

export function eligibleTokenChallenges(challenges: Challenge[]): Challenge[] {
  return challenges.filter((c) => c.currentLevel !== 'NONE' && !c.isCapstone);
}

export async function randomizeChallengeTokens(
  client: LcuClient,
  random: RandomSource = Math.random
): Promise<Challenge[]> {
  const challenges = await client.getChallenges();
  if (!challenges.success || !challenges.data) {
    throw new Error(challenges.error ?? 'Failed to fetch challenges');
  }

  const eligible = eligibleTokenChallenges(challenges.data);
  if (eligible.length === 0) {
    throw new Error('No challenges with a level to show as tokens');
  }

  const picked = pickRandom(eligible, MAX_CHALLENGE_TOKENS, random);
  const result = await client.setChallengeTokens(picked.map((c) => c.id));
  if (!result.success) {
    throw new Error(result.error ?? 'Failed to update challenge tokens');
  }

  return picked;
}

export async function removeChallengeTokens(client: LcuClient): Promise<void> {
  const result = await client.setChallengeTokens([]);
  if (!result.success) {
    throw new Error(result.error ?? 'Failed to remove challenge tokens');
  }
}

/**
 * Switch to a random owned icon other than the current one
 */
export async function randomizeProfileIcon(
  client: LcuClient,
  random: RandomSource = Math.random
): Promise<{ previousIconId: number; profileIconId: number }> {
  const summoner = await client.getCurrentSummoner();
  if (!summoner.success || !summoner.data) {
    throw new Error(summoner.error ?? 'Failed to fetch current summoner');
  }

  const icons = await client.getInventory('SUMMONER_ICON');
  if (!icons.success || !icons.data) {
    throw new Error(icons.error ?? 'Failed to fetch owned icons');
  }

  const previousIconId = summoner.data.profileIconId;
  const candidates = [...new Set(icons.data.map((icon) => icon.itemId))].filter(
    (id) => id !== previousIconId
  );
  if (candidates.length === 0) {
    throw new Error('No other owned profile icon to switch to');
  }
  const [profileIconId] = pickRandom(candidates, 1, random);

  const result = await client.setProfileIcon(profileIconId);
  if (!result.success) {
    throw new Error(result.error ?? 'Failed to set profile icon');
  }

  return { previousIconId, profileIconId };
}
