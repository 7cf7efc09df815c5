export const NAME = 'playwise';
export const VERSION = '0.3.0';
