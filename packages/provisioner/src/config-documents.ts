import * as path from 'node:path';
import type { ConfigDocument } from '@devstrap/core';

export const HELIX_THEME_NAME = 'dark_plus_transparent';

export const HELIX_CONFIG = `# Helix Configuration File

# Theme settings
theme = "dark_plus_transparent"

# Editor settings
[editor]
line-number = "relative"  # Show relative line numbers for easier navigation
bufferline = "multiple"   # Display multiple buffer tabs

# Cursor appearance
[editor.cursor-shape]
insert = "bar"            # Use a thin bar cursor in insert mode

# Keybindings for normal mode
[keys.normal]
esc = ["collapse_selection", "keep_primary_selection"]  # Clear selection but keep primary
C-e = ["scroll_down", "move_line_down"]                # Scroll and move cursor down
C-y = ["scroll_up", "move_line_up"]                    # Scroll and move cursor up

# Keybindings for insert mode
[keys.insert]
j = { k = "normal_mode" }  # Exit insert mode with 'jk'
`;

export const HELIX_THEME = `# Dark Plus Transparent Theme
inherits = "dark_plus"
"ui.background" = {}
`;

/** Settings and theme documents for a Helix config directory. */
export function helixDocuments(configDir: string): ConfigDocument[] {
  return [
    { path: path.join(configDir, 'config.toml'), content: HELIX_CONFIG },
    {
      path: path.join(configDir, 'themes', `${HELIX_THEME_NAME}.toml`),
      content: HELIX_THEME,
    },
  ];
}

/** `pip.conf` pointing pip at a package-index mirror. */
export function pipMirrorDocument(filePath: string, indexUrl: string, trustedHost: string): ConfigDocument {
  return {
    path: filePath,
    content: `[global]\nindex-url = ${indexUrl}\ntrusted-host = ${trustedHost}\n`,
  };
}
