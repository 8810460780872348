export const normalizeWhitespace = (value: string) =>
  value.replace(/\s+/g, " ").trim();

export const toTitleCase = (value: string) =>
  value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

export const containsAny = (haystacks: Array<string | null | undefined>, needles: Iterable<string>) => {
  const lowered = haystacks.map((value) => (value ?? "").toLowerCase());
  for (const needle of needles) {
    const target = needle.toLowerCase();
    if (lowered.some((value) => value.includes(target))) {
      return true;
    }
  }
  return false;
};
