/**
 * Zod validation schemas for API and socket inputs
 */

import { z } from 'zod';
import { PlayerRole } from '../../../shared/types/PlayerTypes.js';
import { ShieldType, WeaponId } from '../../../shared/types/WeaponTypes.js';

// Roster
export const rosterEntrySchema = z.object({
  id: z.string().min(1).max(64),
  name: z.string().min(1).max(64).optional(),
  role: z.nativeEnum(PlayerRole).default(PlayerRole.DUELIST),
  agent: z.string().min(1).max(64).default('Recruit'),
  aim: z.number().min(0).max(100).default(50),
  movementAccuracy: z.number().min(0).max(100).default(50),
  credits: z.number().int().min(0).max(9000).optional(),
  weapon: z.nativeEnum(WeaponId).optional(),
  shield: z.nativeEnum(ShieldType).nullable().optional(),
  abilities: z.array(z.string().min(1)).max(8).optional(),
  ultPoints: z.number().int().min(0).max(7).optional(),
});

const sideRoster = z.array(rosterEntrySchema).min(1).max(5);

/** Which scripted producer drives the players */
export const agentKindSchema = z.enum(['idle', 'waypoint']);

// Rounds
export const simulateRoundSchema = z.object({
  roundNumber: z.number().int().min(1).max(60).default(1),
  seed: z.number().int().min(0).max(0xffffffff).optional(),
  attackers: sideRoster,
  defenders: sideRoster,
  agent: agentKindSchema.default('waypoint'),
  maxTicks: z.number().int().min(1).max(100_000).optional(),
  includeEvents: z.boolean().default(true),
});

// Matches
const teamSchema = z.object({
  id: z.string().min(1).max(64),
  name: z.string().min(1).max(64).optional(),
  players: sideRoster,
});

export const simulateMatchSchema = z.object({
  seed: z.number().int().min(0).max(0xffffffff).optional(),
  teamA: teamSchema,
  teamB: teamSchema,
  agent: agentKindSchema.default('waypoint'),
  maxRounds: z.number().int().min(1).max(100).optional(),
});

// Type exports
export type RosterEntryInput = z.infer<typeof rosterEntrySchema>;
export type AgentKind = z.infer<typeof agentKindSchema>;
export type SimulateRoundInput = z.infer<typeof simulateRoundSchema>;
export type SimulateMatchInput = z.infer<typeof simulateMatchSchema>;
