import { VENDOR_FINGERPRINTS } from '@fieldwise/shared';
import type { VendorProfile } from './types.js';

/**
 * Deutsche Bahn ticket invoices: the issuing company on top, its address
 * on the next line with `·` separators, the traveller's name a few lines
 * further down.
 */
export const DEUTSCHE_BAHN_PROFILE: VendorProfile = {
  id: 'deutsche-bahn',
  markers: VENDOR_FINGERPRINTS,
  recipientWindow: [3, 20],
  recipientSkipWords: ['Invoice', 'Rechnung', 'GmbH', 'Customer', 'Kunde', 'Page', 'Seite', 'Frankfurt', 'Mainzer'],
};

export const VENDOR_PROFILES: readonly VendorProfile[] = [DEUTSCHE_BAHN_PROFILE];

/**
 * First profile whose marker occurs in the text.
 */
export function findVendorProfile(
  text: string,
  profiles: readonly VendorProfile[] = VENDOR_PROFILES,
): VendorProfile | undefined {
  return profiles.find((profile) => profile.markers.some((marker) => text.includes(marker)));
}
