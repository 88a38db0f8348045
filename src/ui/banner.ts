import boxen from 'boxen';
import { createTheme } from './theme.js';

export const customHelp = (version: string, color?: boolean): string => {
  const { colors: c } = createTheme(color);

  const title = boxen(c.brandBold('manpage') + c.muted(` v${version}`), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round',
    borderColor: color === false ? undefined : 'cyan',
  });

  const quickStart = `
${c.brandBold('Quick Start:')}
  ${c.brand('manpage generate ./mytool')}      Write mytool.1 next to its README
  ${c.brand('manpage generate -i ./mytool')}   Generate and install in one step
  ${c.brand('manpage validate mytool.1')}      Check structure and rendering
`;

  return `${title}\n${quickStart}`;
};
