/**
 * Every DOM selector the scraper depends on.
 *
 * The source web UI has no documented markup contract, so when it changes
 * this is the only file that should need editing: extractors read named
 * fields, never selectors.
 */

export interface FieldSpec {
  /** Playwright selector, relative to the page */
  selector: string;
  /** Read an attribute instead of the visible text */
  attribute?: string;
  /** Collect every visible match instead of the first */
  all?: boolean;
  required?: boolean;
}

export interface ExtractSpec {
  name: string;
  /** Present once the view is rendered, whether or not the fields are */
  root: string;
  fields: Record<string, FieldSpec>;
  /** Key that reveals the fields when they are hidden (e.g. the info panel) */
  revealKey?: string;
}

export interface ItemFieldSpec {
  /** Relative to the item; omitted means the item itself */
  selector?: string;
  attribute?: string;
}

export interface ListingSpec {
  name: string;
  root: string;
  item: string;
  /** Attribute giving each item its identity (deduplicates across scrolls) */
  keyAttribute: string;
  fields: Record<string, ItemFieldSpec>;
}

// ============================================
// SESSION SIGNALS
// ============================================

export const SESSION_SIGNALS = {
  /** Main navigation, only rendered for a signed-in account */
  mainNavigation: '[role="navigation"]',
  /** Account button; its aria-label carries the account name and email */
  accountButton: 'a[aria-label^="Google Account"]',
  signInUrl: /accounts\.google\.com|\/login\b|\bsignin\b|ServiceLogin/i,
} as const;

export const SUPPORTED_LANGUAGE = /^en(-|$)/i;

// ============================================
// ALBUMS VIEW
// ============================================

export const ALBUM_LIST: ListingSpec = {
  name: 'album-list',
  root: '[role="main"]',
  item: 'a[href*="/album/"], a[href*="/share/"]',
  keyAttribute: 'href',
  fields: {
    // "Trip 2023\n12 items · Shared"
    text: {},
    label: { attribute: 'aria-label' },
  },
};

// ============================================
// ALBUM VIEW
// ============================================

export const ALBUM_DETAIL: ExtractSpec = {
  name: 'album-detail',
  root: '[role="main"]',
  fields: {
    title: { selector: '[role="main"] h1, [role="main"] [aria-label="Album title"]', required: true },
    subtitle: { selector: '[role="main"] [aria-label*="items"]' },
    dateRange: { selector: '[role="main"] [aria-label*="Date range"]' },
    shareButton: { selector: 'button[aria-label="Share"], [aria-label="Show people"]', attribute: 'aria-label' },
  },
};

export const ALBUM_ASSETS: ListingSpec = {
  name: 'album-assets',
  root: '[role="main"]',
  item: 'a[aria-label^="Photo -"], a[aria-label^="Video -"]',
  keyAttribute: 'href',
  fields: {
    // "Photo - Landscape - Jun 3, 2023, 10:15:02 AM"
    label: { attribute: 'aria-label' },
  },
};

// ============================================
// SHARING PANEL
// ============================================

export const SHARING_TRIGGER = '[aria-label="Show people"], button[aria-label="Share"]';

export const SHARING_MEMBERS: ListingSpec = {
  name: 'sharing-members',
  root: '[role="dialog"]',
  item: '[role="dialog"] [role="listitem"]',
  keyAttribute: 'data-member-id',
  fields: {
    // "Jane Doe\nOwner"
    text: {},
    profileId: { attribute: 'data-member-id' },
    email: { selector: '[data-email]', attribute: 'data-email' },
  },
};

// ============================================
// ASSET VIEW (info panel)
// ============================================

export const ASSET_INFO: ExtractSpec = {
  name: 'asset-info',
  root: '[role="main"] img, [role="main"] video',
  revealKey: 'i',
  fields: {
    filename: { selector: 'div[aria-label*="Filename"]', required: true },
    date: { selector: 'div[aria-label*="Date taken"]' },
    time: { selector: 'span[aria-label*="Time taken"]' },
    sharedBy: { selector: 'div:text("Shared by")' },
    tags: { selector: 'a[aria-label^="Tag:"]', attribute: 'aria-label', all: true },
    saved: { selector: '[aria-label="Saved to your photos"], [aria-label="Saved"]', attribute: 'aria-label' },
    // Only a video asset renders a player
    video: { selector: '[role="main"] video', attribute: 'src' },
    next: { selector: 'a[aria-label="View next photo"]', attribute: 'href' },
  },
};
