type Color = 'green' | 'cyan' | 'yellow' | 'magenta' | 'red' | 'reset' | 'dim';

const ANSI: Record<Color, string> = {
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  red: '\x1b[31m',
  reset: '\x1b[0m',
  dim: '\x1b[2m',
};

const PLAIN: Record<Color, string> = {
  green: '',
  cyan: '',
  yellow: '',
  magenta: '',
  red: '',
  reset: '',
  dim: '',
};

// https://no-color.org
const colorEnabled = process.env.NO_COLOR === undefined || process.env.NO_COLOR === '';

export const COLORS: Readonly<Record<Color, string>> = colorEnabled ? ANSI : PLAIN;

const paint = (color: Color) => (s: string) => `${COLORS[color]}${s}${COLORS.reset}`;

export const green = paint('green');
export const cyan = paint('cyan');
export const yellow = paint('yellow');
export const magenta = paint('magenta');
export const red = paint('red');
export const dim = paint('dim');
