export const API_PREFIX = 'api';

export const DEFAULT_CURRENCY = 'INR';

export const RECEIPT_PREFIX = 'RCP';
