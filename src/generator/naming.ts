const WORD_SEPARATOR = /[_\-\s]+/;

/**
 * Uppercases the first character and lowercases the rest, so `"XML"` becomes `"Xml"`.
 * Not locale-aware.
 */
export const capitalize = (word: string): string => {
  if (word.length === 0) return word;
  return word[0].toUpperCase() + word.slice(1).toLowerCase();
};

const splitWords = (text: string): string[] => text.split(WORD_SEPARATOR);

export const toCamel = (text: string): string => {
  if (text.length === 0) return text;
  const words = splitWords(text);
  return words[0].toLowerCase() + words.slice(1).map(capitalize).join("");
};

export const toPascal = (text: string): string => {
  if (text.length === 0) return text;
  return splitWords(text).map(capitalize).join("");
};

/**
 * Works on the raw input rather than on the split words: underscore runs are kept as-is,
 * so `"My-Name_Thing"` gives `"my__name__thing"` while `toPascal` gives `"MyNameThing"`.
 */
export const toSnake = (text: string): string =>
  text
    .replace(/[A-Z]/g, "_$&")
    .replace(/[-\s]+/g, "_")
    .toLowerCase()
    .replace(/^_/, "");
