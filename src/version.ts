export const NAME = 'voicekit';
export const VERSION = '0.1.0';
