import type { ClientCategory, ClientDescriptor } from '../models/types.js';

interface Signature {
  category: ClientCategory;
  matches(clientName: string, deviceName: string): boolean;
}

const includesAny = (value: string, needles: readonly string[]): boolean =>
  needles.some((needle) => value.includes(needle));

/**
 * Ordered; the first match wins. Android entries are split so TV boxes
 * (and Fire TV in particular) are told apart from phones.
 */
const SIGNATURES: readonly Signature[] = [
  { category: 'roku', matches: (client) => client.includes('roku') },
  {
    category: 'apple-tv',
    matches: (client, device) => client.includes('swiftfin') && includesAny(device, ['apple tv', 'appletv']),
  },
  { category: 'apple-mobile', matches: (client) => client.includes('swiftfin') },
  {
    category: 'fire-tv',
    matches: (client, device) =>
      client.includes('android') && isAndroidTvBox(client, device) && includesAny(device, ['fire', 'aft']),
  },
  {
    category: 'android-tv',
    matches: (client, device) => client.includes('android') && isAndroidTvBox(client, device),
  },
  { category: 'android-mobile', matches: (client) => client.includes('android') },
  { category: 'android-tv', matches: (client) => client.includes('findroid') },
  { category: 'web-browser', matches: (client) => includesAny(client, ['jellyfin web', 'jellyfin-web']) },
  {
    category: 'desktop',
    matches: (client) => includesAny(client, ['jellyfin media player', 'jellyfin desktop', 'jellyfin mpv']),
  },
  { category: 'xbox', matches: (client) => client.includes('xbox') },
  { category: 'kodi', matches: (client) => client.includes('kodi') },
  { category: 'dlna', matches: (client) => client.includes('dlna') },
];

function isAndroidTvBox(client: string, device: string): boolean {
  return client.includes('androidtv') || includesAny(device, ['fire tv', 'firetv', 'aftm']);
}

/**
 * Map a session descriptor to a client category from its application and
 * device names. Unrecognised clients are `unknown`.
 */
export function resolveClientCategory(descriptor: Pick<ClientDescriptor, 'clientName' | 'deviceName'>): ClientCategory {
  const client = (descriptor.clientName ?? '').toLowerCase();
  const device = (descriptor.deviceName ?? '').toLowerCase();

  for (const signature of SIGNATURES) {
    if (signature.matches(client, device)) return signature.category;
  }
  return 'unknown';
}
