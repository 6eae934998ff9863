export const SERVER_NAME = 'self-assessment';
export const SERVER_VERSION = '0.1.0';
