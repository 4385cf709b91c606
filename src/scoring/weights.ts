// Points per character of a shared token.
export const WORD_WEIGHT = 1.0;
export const SEPARATOR_WEIGHT = 0.1;
