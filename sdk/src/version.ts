export const SDK_NAME = 'hyp3-client';
export const SDK_VERSION = '0.1.0';

export const USER_AGENT = `${SDK_NAME}/${SDK_VERSION}`;
