// Theme definitions for stashdeck

export type ThemeName =
  | 'dark'
  | 'light'
  | 'dark-colorblind'
  | 'light-colorblind'
  | 'dark-ansi'
  | 'light-ansi';

export interface UIColors {
  // Title badge and accents
  brand: string;
  // Diff lines
  added: string;
  removed: string;
  hunk: string;
  fileHeader: string;
  // List columns
  index: string;
  branch: string;
  date: string;
  text: string;
  dim: string;
  selectedBg: string;
  // Dialog borders
  success: string;
  warning: string;
  danger: string;
}

export interface Theme {
  name: ThemeName;
  colors: UIColors;
}

const darkTheme: Theme = {
  name: 'dark',
  colors: {
    brand: '#ff8700',
    added: 'green',
    removed: 'red',
    hunk: 'cyan',
    fileHeader: 'yellow',
    index: '#ff8700',
    branch: 'cyan',
    date: 'gray',
    text: 'white',
    dim: 'gray',
    selectedBg: '#2d2d3c',
    success: 'green',
    warning: 'yellow',
    danger: 'red',
  },
};

const lightTheme: Theme = {
  name: 'light',
  colors: {
    brand: '#d75f00',
    added: '#2f9d44',
    removed: '#d1454b',
    hunk: '#0077b3',
    fileHeader: '#8a6d00',
    index: '#d75f00',
    branch: '#0077b3',
    date: '#6c757d',
    text: 'black',
    dim: '#6c757d',
    selectedBg: '#dde3ea',
    success: '#2f9d44',
    warning: '#8a6d00',
    danger: '#d1454b',
  },
};

// Blue/orange instead of green/red for added/removed lines
const darkColorblindTheme: Theme = {
  name: 'dark-colorblind',
  colors: {
    ...darkTheme.colors,
    added: '#0077b3',
    removed: '#ff8700',
    success: '#0077b3',
    danger: '#ff8700',
  },
};

const lightColorblindTheme: Theme = {
  name: 'light-colorblind',
  colors: {
    ...lightTheme.colors,
    added: '#3366cc',
    removed: '#993333',
    success: '#3366cc',
    danger: '#993333',
  },
};

// Terminal's native 16 ANSI colors only
const darkAnsiTheme: Theme = {
  name: 'dark-ansi',
  colors: {
    brand: 'yellow',
    added: 'green',
    removed: 'red',
    hunk: 'cyan',
    fileHeader: 'yellow',
    index: 'yellow',
    branch: 'cyan',
    date: 'gray',
    text: 'white',
    dim: 'gray',
    selectedBg: 'blue',
    success: 'green',
    warning: 'yellow',
    danger: 'red',
  },
};

const lightAnsiTheme: Theme = {
  name: 'light-ansi',
  colors: {
    ...darkAnsiTheme.colors,
    text: 'black',
    selectedBg: 'white',
  },
};

export const themes: Record<ThemeName, Theme> = {
  dark: darkTheme,
  light: lightTheme,
  'dark-colorblind': darkColorblindTheme,
  'light-colorblind': lightColorblindTheme,
  'dark-ansi': darkAnsiTheme,
  'light-ansi': lightAnsiTheme,
};

export function getTheme(name: ThemeName): Theme {
  return themes[name] ?? themes['dark'];
}
