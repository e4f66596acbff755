/**
 * Study Planner - Profile View
 *
 * Age is derived on every read from the stored birth date.
 */

import { ValidationError } from './errors';
import { ageOn, assertIsoDate, todayIso } from './dates';
import type { Profile, ProfilePatch } from './db/types';

export interface ProfileView {
  height_m: number | null;
  birthdate: string | null;
  age: number | null;
}

export function profileView(profile: Profile, today: string = todayIso()): ProfileView {
  return {
    height_m: profile.height_m,
    birthdate: profile.birthdate,
    age: profile.birthdate === null ? null : ageOn(profile.birthdate, today),
  };
}

export function readProfilePatch(body: Record<string, unknown>): ProfilePatch {
  const patch: ProfilePatch = {};

  if (body.height_m !== undefined && body.height_m !== null) {
    if (typeof body.height_m !== 'number' || !Number.isFinite(body.height_m) || body.height_m <= 0) {
      throw new ValidationError('height_m must be a positive number of meters', 'height_m');
    }
    patch.height_m = body.height_m;
  }

  if (body.birthdate !== undefined && body.birthdate !== null) {
    patch.birthdate = assertIsoDate(body.birthdate, 'birthdate');
  }

  return patch;
}
