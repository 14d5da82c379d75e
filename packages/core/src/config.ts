import type { Platform } from './platform.js';

/** Top-level configuration schema for devstrap. */
export interface DevstrapConfig {
  network: NetworkConfig;
  packageManager: PackageManagerConfig;
  runtime: RuntimeConfig;
  mirror: MirrorConfig;
  packages: string[];
  shellProfile: ShellProfileConfig;
  editor: EditorConfig;
}

export interface NetworkConfig {
  probeUrl: string;
  timeoutMs: number;
}

export interface PackageManagerConfig {
  installScriptUrl: string;
  /** Homebrew prefix per platform; `<prefix>/bin/brew` is the executable. */
  prefix: Record<Platform, string>;
}

export interface RuntimeConfig {
  /** Install directory, relative to the home directory. */
  installDir: string;
  installerUrls: Record<Platform, string>;
}

export interface MirrorConfig {
  enabled: boolean;
  indexUrl: string;
  trustedHost: string;
}

export interface ShellProfileConfig {
  /** Profile file per platform, relative to the home directory. */
  files: Record<Platform, string>;
  /** Skip the append when the profile already holds the exact line. */
  dedupe: boolean;
}

export interface EditorConfig {
  /** Helix configuration directory, relative to the home directory. */
  configDir: string;
}

const MINICONDA_MIRROR = 'https://mirrors.tuna.tsinghua.edu.cn/anaconda/miniconda';

export function defaultConfig(): DevstrapConfig {
  return {
    network: {
      probeUrl: 'https://github.com',
      timeoutMs: 5_000,
    },
    packageManager: {
      installScriptUrl: 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh',
      prefix: {
        macOS: '/opt/homebrew',
        Linux: '/home/linuxbrew/.linuxbrew',
      },
    },
    runtime: {
      installDir: 'miniconda',
      installerUrls: {
        macOS: `${MINICONDA_MIRROR}/Miniconda3-latest-MacOSX-x86_64.sh`,
        Linux: `${MINICONDA_MIRROR}/Miniconda3-latest-Linux-x86_64.sh`,
      },
    },
    mirror: {
      enabled: false,
      indexUrl: 'https://pypi.tuna.tsinghua.edu.cn/simple',
      trustedHost: 'pypi.tuna.tsinghua.edu.cn',
    },
    packages: ['helix', 'fish', 'tmux'],
    shellProfile: {
      files: {
        macOS: '.zshrc',
        Linux: '.bashrc',
      },
      dedupe: false,
    },
    editor: {
      configDir: '.config/helix',
    },
  };
}
