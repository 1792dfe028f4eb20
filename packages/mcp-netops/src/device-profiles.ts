import { ConfigurationError } from './errors.js';

export interface DeviceProfile {
  id: string;
  // Any CLI prompt at the end of the receive buffer
  prompt: RegExp;
  // Privileged-level prompt; profiles without one log in at the working level
  privilegedPrompt?: RegExp;
  enableCommand?: string;
  passwordPrompt: RegExp;
  // In-band login prompts for devices that skip SSH auth
  usernamePrompt: RegExp;
  sessionSetup: readonly string[];
  configEnter: string;
  configExit: string;
  saveCommand?: string;
  // Confirmation question answered with a bare newline
  saveConfirm?: RegExp;
  showConfigCommand: string;
  errorPatterns: readonly RegExp[];
}

const CISCO_PROMPT = /[\w.\-@()/:]+[>#]\s*$/;
const CISCO_ERRORS = [/^\s*% ?(Invalid|Incomplete|Ambiguous|Unknown|Unrecognized)/im];

const ciscoIos: DeviceProfile = {
  id: 'cisco_ios',
  prompt: CISCO_PROMPT,
  privilegedPrompt: /#\s*$/,
  enableCommand: 'enable',
  passwordPrompt: /[Pp]assword:\s*$/,
  usernamePrompt: /[Uu]sername:\s*$/,
  sessionSetup: ['terminal length 0', 'terminal width 511'],
  configEnter: 'configure terminal',
  configExit: 'end',
  saveCommand: 'write memory',
  saveConfirm: /\[confirm\]\s*$|\?\s*$/,
  showConfigCommand: 'show startup-config',
  errorPatterns: CISCO_ERRORS,
};

const ciscoNxos: DeviceProfile = {
  ...ciscoIos,
  id: 'cisco_nxos',
  privilegedPrompt: undefined,
  enableCommand: undefined,
  sessionSetup: ['terminal length 0', 'terminal width 511'],
  saveCommand: 'copy running-config startup-config',
};

const aristaEos: DeviceProfile = {
  ...ciscoIos,
  id: 'arista_eos',
  sessionSetup: ['terminal length 0', 'terminal width 32767'],
};

const juniperJunos: DeviceProfile = {
  id: 'juniper_junos',
  prompt: /[\w.\-@]+[>#%]\s*$/,
  passwordPrompt: /[Pp]assword:\s*$/,
  usernamePrompt: /login:\s*$/,
  sessionSetup: ['set cli screen-length 0', 'set cli screen-width 511'],
  configEnter: 'configure',
  configExit: 'commit and-quit',
  showConfigCommand: 'show configuration',
  errorPatterns: [/^\s*(error:|syntax error|unknown command)/im],
};

export const DEVICE_PROFILES: ReadonlyMap<string, DeviceProfile> = new Map([
  [ciscoIos.id, ciscoIos],
  ['cisco_xe', { ...ciscoIos, id: 'cisco_xe' }],
  [ciscoNxos.id, ciscoNxos],
  [aristaEos.id, aristaEos],
  [juniperJunos.id, juniperJunos],
]);

export function knownDeviceTypes(): ReadonlySet<string> {
  return new Set(DEVICE_PROFILES.keys());
}

export function getProfile(deviceType: string): DeviceProfile {
  const profile = DEVICE_PROFILES.get(deviceType);
  if (!profile) {
    const available = [...DEVICE_PROFILES.keys()].join(', ');
    throw new ConfigurationError(`Unknown device_type: ${deviceType}. Available: ${available}`);
  }
  return profile;
}
