import { ConfigurationError } from './utils/errors.js';
import { getLogger } from './utils/logger.js';

const log = getLogger('efb.coordinator');

export const DEFAULT_PROFILE = 'default';

/**
 * Read-only access to the name of the active profile
 */
export interface ProfileProvider {
  readonly profile: string;
}

/**
 * Owner of the process-wide profile. Consumers receive it as a
 * ProfileProvider and never change it.
 */
export class Coordinator implements ProfileProvider {
  private currentProfile = DEFAULT_PROFILE;

  get profile(): string {
    return this.currentProfile;
  }

  setProfile(profile: string): void {
    if (!profile.trim()) {
      throw new ConfigurationError('Profile name must not be empty');
    }
    this.currentProfile = profile;
    log.debug('Active profile set to %s', profile);
  }
}

export const coordinator = new Coordinator();

/**
 * Provider that always reports the same profile
 */
export function fixedProfile(profile: string): ProfileProvider {
  return { profile };
}
