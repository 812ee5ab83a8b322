import type { AppStateData } from '../../state/AppState.js';
import type { Theme } from '../../themes.js';
import { abbreviateHomePath } from '../../config.js';
import { escapeTags, visibleLength } from '../../utils/text.js';

export const APP_TITLE = 'stashdeck';

/**
 * Search indicator: live query with a cursor while typing, persistent filter otherwise.
 */
export function formatSearchIndicator(searchQuery: string, isSearching: boolean): string {
  if (isSearching) return `  /${searchQuery}_`;
  if (searchQuery) return `  filter: /${searchQuery}`;
  return '';
}

/**
 * Format header content as blessed-compatible tagged string.
 */
export function formatHeader(
  state: Pick<AppStateData, 'currentBranch' | 'stashes' | 'searchQuery' | 'isSearching' | 'busy'>,
  repoPath: string,
  theme: Theme,
  width: number
): string {
  const { colors } = theme;
  const branch = state.currentBranch || '(detached)';

  let leftContent = `{bold}{black-fg}{${colors.brand}-bg} ${APP_TITLE} {/${colors.brand}-bg}{/black-fg}{/bold}`;
  leftContent += `{${colors.dim}-fg}  branch: {/${colors.dim}-fg}{bold}{${colors.branch}-fg}${escapeTags(branch)}{/${colors.branch}-fg}{/bold}`;
  leftContent += `{${colors.dim}-fg}  stashes: ${state.stashes.length}{/${colors.dim}-fg}`;

  const search = formatSearchIndicator(state.searchQuery, state.isSearching);
  if (search) {
    leftContent += `{${colors.warning}-fg}${escapeTags(search)}{/${colors.warning}-fg}`;
  }

  if (state.busy) {
    leftContent += ` {${colors.warning}-fg}⟳{/${colors.warning}-fg}`;
  }

  const rightContent = `{${colors.dim}-fg}${escapeTags(abbreviateHomePath(repoPath))}{/${colors.dim}-fg}`;
  const padding = width - visibleLength(leftContent) - visibleLength(rightContent) - 1;
  if (padding < 1) {
    return leftContent;
  }
  return leftContent + ' '.repeat(padding) + rightContent;
}
