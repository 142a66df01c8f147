/**
 * WhatsApp JID utilities
 */

export const GROUP_JID_SUFFIX = '@g.us';

/** Check if a JID is a group (ends with @g.us) */
export function isGroupJid(jid: string): boolean {
  return jid.endsWith(GROUP_JID_SUFFIX);
}

/** Extract the phone number from a user JID (or return the input when it has no domain) */
export function phoneFromJid(jid: string): string {
  return jid.split('@')[0];
}

/** Escape LIKE wildcards so user input only ever matches literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
