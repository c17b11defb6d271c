import { RoleType } from './role.types';

export type Card = Readonly<{
  id: number;
  name: string;
  roleType: RoleType;
  text: string;
  flavor?: string;
  rarity: string;
}>;

export type CardPool = Readonly<Record<RoleType, readonly Card[]>>;

const WIN_CONDITIONS: Record<RoleType, string> = {
  Leader: 'Survive and be the last player standing',
  Guardian: 'Win or lose with the Leader',
  Assassin: 'Win if the Leader is eliminated',
  Traitor: 'Be the last player standing',
};

export function winCondition(roleType: RoleType): string {
  return WIN_CONDITIONS[roleType];
}
