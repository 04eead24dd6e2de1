import { BaseResolver } from './BaseResolver.js';

/**
 * Resolves spoken vendor and maintainer company names ("Medika", "Elettro Impianti")
 */
export class VendorResolver extends BaseResolver<'vendor'> {
  getEntityKind(): 'vendor' {
    return 'vendor';
  }
}
