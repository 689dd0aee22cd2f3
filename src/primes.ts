/** Trial-division primality test */
export function isPrime(n: number): boolean {
  if (!Number.isSafeInteger(n) || n < 2) return false;
  if (n % 2 === 0) return n === 2;
  if (n % 3 === 0) return n === 3;
  for (let d = 5; d * d <= n; d += 6) {
    if (n % d === 0 || n % (d + 2) === 0) return false;
  }
  return true;
}

/**
 * Returns the smallest prime greater than or equal to `n`, and never less than 2
 */
export function nextPrime(n: number): number {
  let candidate = Math.max(Math.ceil(n), 2);
  while (!isPrime(candidate)) {
    candidate++;
  }
  return candidate;
}
