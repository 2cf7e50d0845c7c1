/**
 * Creates a debounced function that delays invoking func until after wait milliseconds
 * have elapsed since the last time the debounced function was invoked.
 */
export function debounce<Args extends unknown[]>(
  func: (...args: Args) => void,
  wait: number,
): ((...args: Args) => void) & { cancel(): void } {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const debounced = (...args: Args): void => {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    timeoutId = setTimeout(() => {
      timeoutId = undefined;
      func(...args);
    }, wait);
  };

  return Object.assign(debounced, {
    cancel(): void {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
      timeoutId = undefined;
    },
  });
}
