// Fixed input limits, shared by the validators in utils/errors.ts
export const MAX_TOP_K = 100;
export const MAX_QUERY_LENGTH = 2000;
