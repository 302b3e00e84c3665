const NAMED_ENTITIES = {
  lt: "<",
  gt: ">",
  amp: "&",
} as const;

const CHAR_TO_ENTITY = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
} as const;

const ENTITY_RE = /&(lt|gt|amp);/g;
const SPECIAL_CHARS_RE = /[&<>]/g;

const isNamedEntity = (name: string): name is keyof typeof NAMED_ENTITIES =>
  Object.prototype.hasOwnProperty.call(NAMED_ENTITIES, name);

const isSpecialChar = (char: string): char is keyof typeof CHAR_TO_ENTITY =>
  Object.prototype.hasOwnProperty.call(CHAR_TO_ENTITY, char);

/**
 * Resolves `&lt;`, `&gt;` and `&amp;` in one pass, so `&amp;lt;` decodes to
 * `&lt;` and never further. Any other reference is left untouched.
 */
export const decodeEntities = (text: string): string => {
  if (!text.includes("&")) {
    return text;
  }
  return text.replace(ENTITY_RE, (match, name: string) =>
    isNamedEntity(name) ? NAMED_ENTITIES[name] : match
  );
};

/**
 * Encodes `&`, `<` and `>`. One pass over the input, so the ampersands of
 * inserted entities are never encoded again.
 */
export const encodeEntities = (text: string): string => {
  return text.replace(SPECIAL_CHARS_RE, (char) => (isSpecialChar(char) ? CHAR_TO_ENTITY[char] : char));
};
