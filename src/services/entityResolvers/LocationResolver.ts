import { BaseResolver } from './BaseResolver.js';

/**
 * Resolves spoken location names ("Radiologia", "sala operatoria 2")
 */
export class LocationResolver extends BaseResolver<'location'> {
  getEntityKind(): 'location' {
    return 'location';
  }
}
