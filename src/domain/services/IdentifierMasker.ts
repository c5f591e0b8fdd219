export const maskIdentifier = (identifier: string): string => {
  if (identifier.length <= 4) {
    return '****';
  }

  return `${identifier.slice(0, 4)}****`;
};
