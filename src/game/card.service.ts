import * as fs from 'fs';
import * as path from 'path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { CardPoolError, UnknownRoleTypeError } from '../common/errors';
import { Card, CardPool } from '../types/card.types';
import { ROLE_ORDER, RoleType, parseRoleType } from '../types/role.types';

export const CARD_POOL = Symbol('CARD_POOL');

export const DEFAULT_CARDS_PATH = path.join(__dirname, '..', '..', 'data', 'cards.json');

const collectionSchema = z.object({
  set_name: z.string().optional(),
  cards: z.array(
    z.object({
      id: z.number().int(),
      name: z.string().min(1),
      types: z.object({ supertype: z.string().optional(), subtype: z.string() }),
      rarity: z.string().default('common'),
      text: z.string().default(''),
      flavor: z.string().optional(),
    }),
  ),
});

const logger = new Logger('CardPool');

/**
 * Builds a frozen pool from a list of cards. Names must be unique across the
 * whole pool since they are the enablement key in role configurations.
 */
export function createCardPool(cards: readonly Card[]): CardPool {
  const seen = new Set<string>();
  const byType: Record<RoleType, Card[]> = { Leader: [], Guardian: [], Assassin: [], Traitor: [] };

  for (const card of cards) {
    if (seen.has(card.name)) throw new CardPoolError(`duplicate card name: ${card.name}`);
    seen.add(card.name);
    byType[card.roleType].push(Object.freeze({ ...card }));
  }

  return Object.freeze({
    Leader: Object.freeze(byType.Leader),
    Guardian: Object.freeze(byType.Guardian),
    Assassin: Object.freeze(byType.Assassin),
    Traitor: Object.freeze(byType.Traitor),
  });
}

/**
 * Loads the card collection JSON. Cards whose subtype is not one of the four
 * role types are skipped.
 */
export function loadCardPool(filePath: string = DEFAULT_CARDS_PATH): CardPool {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CardPoolError(`failed to read card collection ${filePath}: ${reason}`);
  }

  const parsed = collectionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CardPoolError(`invalid card collection at ${issue.path.join('.')}: ${issue.message}`);
  }

  const cards: Card[] = [];
  for (const c of parsed.data.cards) {
    let roleType: RoleType;
    try {
      roleType = parseRoleType(c.types.subtype);
    } catch (err) {
      if (!(err instanceof UnknownRoleTypeError)) throw err;
      logger.warn(`Skipping card ${c.id} (${c.name}): unknown subtype ${c.types.subtype}`);
      continue;
    }
    cards.push({ id: c.id, name: c.name, roleType, text: c.text, flavor: c.flavor, rarity: c.rarity });
  }

  const pool = createCardPool(cards);
  logger.log(
    `Loaded ${cards.length} cards from ${parsed.data.set_name ?? path.basename(filePath)} ` +
      ROLE_ORDER.map(r => `${r}=${pool[r].length}`).join(' '),
  );
  return pool;
}

@Injectable()
export class CardService {
  constructor(@Inject(CARD_POOL) private readonly pool: CardPool) {}

  getCards(roleType: RoleType): readonly Card[] {
    return this.pool[roleType];
  }

  allCards(): Card[] {
    return ROLE_ORDER.flatMap(r => this.pool[r]);
  }

  findCard(name: string): Card | undefined {
    for (const r of ROLE_ORDER) {
      const card = this.pool[r].find(c => c.name === name);
      if (card) return card;
    }
    return undefined;
  }
}
