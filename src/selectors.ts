/**
 * Site-specific CSS selectors. Nothing else in the crawler knows the
 * site's markup.
 */

export interface TextLookup {
  selector: string;
  /** Read this attribute instead of the visible text */
  attribute?: string;
}

export const LISTING_LINKS = '#browse_content .browse a';
export const NEXT_PAGE = '.pagination a[rel=next]';

/** Tried in order until one yields a non-empty title */
export const FOLDER_TITLE_LOOKUPS: readonly TextLookup[] = [
  { selector: '#page_header h1 a' },
  { selector: '#page_header h1' },
  { selector: '#group_header h1 a', attribute: 'title' },
  { selector: '#group_header h1 a' }
];

export const VIDEO_TITLE = 'h1[itemprop=name]';
export const DOWNLOAD_BUTTON = '.iconify_down_b';
export const DOWNLOAD_PANEL = '#download';
export const DOWNLOAD_LINKS = 'a';

export const SETTINGS_BUTTON = '#change_settings';
export const LANGUAGE_SELECT = 'select[name=language]';
export const LANGUAGE_OPTIONS = 'option';
export const SETTINGS_SUBMIT = '#settings_form input[type=submit]';

export const LOGIN_PATH = 'log_in';
export const LOGIN_EMAIL = '#email';
export const LOGIN_PASSWORD = '#password';
export const LOGIN_SUBMIT = '#login_form input[type=submit]';
export const ACCOUNT_MENU_LINK = '#menu .me a';

export const USER_AGENT_SCRIPT = 'navigator.userAgent';
