/** Closes a switch that must cover every member of a union */
export const exhaustive = (value: never): never => {
  throw new Error(`Unhandled case ${JSON.stringify(value)}`);
};

/** Reads an on/off switch from an environment value such as `1`, `true` or `off` */
export const flagEnabled = (value: string | undefined): boolean => {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return ["1", "true", "on", "yes"].includes(normalized);
};
