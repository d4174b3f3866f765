/**
 * Lower-cases, strips accents and joins words with single hyphens.
 * "Intro to Python!" -> "intro-to-python"
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s_-]/g, '')
    .trim()
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Returns `base` or the first free `base-N` (N = 1, 2, ...).
 */
export async function uniqueSlug(
  title: string,
  isTaken: (candidate: string) => Promise<boolean>,
): Promise<string> {
  const base = slugify(title) || 'course';
  let candidate = base;
  let counter = 1;

  while (await isTaken(candidate)) {
    candidate = `${base}-${counter}`;
    counter += 1;
  }

  return candidate;
}
