export type JSONReplacer = (this: unknown, key: string, value: unknown) => unknown;

export type StringifyOptions = { replacer?: JSONReplacer };

const defaultReplacer: JSONReplacer = (_key, value) =>
  typeof value === 'bigint' ? value.toString() : value;

const composeReplacer =
  (replacer?: JSONReplacer): JSONReplacer =>
  function (this: unknown, key, value) {
    const replaced = defaultReplacer.call(this, key, value);
    return replacer ? replacer.call(this, key, replaced) : replaced;
  };

// Positions are bigints, which JSON.stringify rejects by default
export const JSONParser = {
  stringify: (value: unknown, options?: StringifyOptions): string =>
    JSON.stringify(value, composeReplacer(options?.replacer)) ??
    String(value),
};
