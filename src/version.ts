export const NAME = 'voxdesk';
export const VERSION = '0.1.0';
