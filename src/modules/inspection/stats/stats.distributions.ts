/**
 * Special functions and tail probabilities used by the hypothesis tests.
 */

const LANCZOS_G = 7;
const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
];

/** ln Γ(x) for x > 0 (Lanczos approximation, reflection below 0.5). */
export function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(1 - x);
  }
  const z = x - 1;
  let a = LANCZOS[0];
  const t = z + LANCZOS_G + 0.5;
  for (let i = 1; i < LANCZOS.length; i++) a += LANCZOS[i] / (z + i);
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

/** ln C(n, k) */
export function logChoose(n: number, k: number): number {
  return logGamma(n + 1) - logGamma(k + 1) - logGamma(n - k + 1);
}

function betaContinuedFraction(a: number, b: number, x: number): number {
  const MAX_ITER = 300;
  const EPS = 3e-14;
  const FPMIN = 1e-300;

  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < FPMIN) d = FPMIN;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= MAX_ITER; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < FPMIN) d = FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < FPMIN) c = FPMIN;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < FPMIN) d = FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < FPMIN) c = FPMIN;
    d = 1 / d;
    const del = d * c;
    h *= del;
    if (Math.abs(del - 1) < EPS) break;
  }
  return h;
}

/** Regularized incomplete beta I_x(a, b). */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x)
  );
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/** Two-sided tail probability P(|T| ≥ |t|) for Student's t with df degrees of freedom. */
export function studentTTwoSided(t: number, df: number): number {
  if (!Number.isFinite(t)) return 0;
  const x = df / (df + t * t);
  return clamp01(regularizedIncompleteBeta(x, df / 2, 0.5));
}

/** Complementary error function, |error| < 1.2e-7. */
export function erfc(x: number): number {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const r =
    t *
    Math.exp(
      -z * z -
        1.26551223 +
        t *
          (1.00002368 +
            t *
              (0.37409196 +
                t *
                  (0.09678418 +
                    t * (-0.18628806 + t * (0.27886807 + t * (-1.13520398 + t * (1.48851587 + t * (-0.82215223 + t * 0.17087277))))))))
    );
  return x >= 0 ? r : 2 - r;
}

/** Upper tail of chi-square with one degree of freedom. */
export function chiSquare1Survival(stat: number): number {
  if (stat <= 0) return 1;
  return clamp01(erfc(Math.sqrt(stat / 2)));
}

/**
 * Kolmogorov distribution tail Q(λ) = 2 Σ (−1)^(j−1) exp(−2 j² λ²).
 * Returns 1 when the series does not converge (λ near 0).
 */
export function kolmogorovSurvival(lambda: number): number {
  const EPS1 = 1e-3;
  const EPS2 = 1e-8;
  const a2 = -2 * lambda * lambda;
  let fac = 2;
  let total = 0;
  let previous = 0;
  for (let j = 1; j <= 100; j++) {
    const term = fac * Math.exp(a2 * j * j);
    total += term;
    if (Math.abs(term) <= EPS1 * previous || Math.abs(term) <= EPS2 * total) {
      return clamp01(total);
    }
    fac = -fac;
    previous = Math.abs(term);
  }
  return 1;
}

function gcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    const r = x % y;
    x = y;
    y = r;
  }
  return x;
}

/**
 * Exact two-sided tail P(D ≥ d) of the two-sample KS statistic under H0.
 *
 * Counts the monotone lattice paths from (0, 0) to (n1, n2) that stay
 * strictly inside |i/n1 − j/n2| < d; the tail is one minus their share of
 * all C(n1 + n2, n1) paths. d is snapped to the lattice h / lcm(n1, n2).
 */
export function ksExactSurvival(n1: number, n2: number, d: number): number {
  const g = gcd(n1, n2);
  const h = Math.round(d * (n1 / g) * n2);
  if (h === 0) return 1;
  // |i/n1 − j/n2| ≥ h/lcm  ⇔  |i·n2 − j·n1| ≥ h·g
  const limit = h * g;

  let column = new Array<number>(n2 + 1).fill(0);
  for (let i = 0; i <= n1; i++) {
    const next = new Array<number>(n2 + 1).fill(0);
    for (let j = 0; j <= n2; j++) {
      if (Math.abs(i * n2 - j * n1) >= limit) continue;
      if (i === 0 && j === 0) next[j] = 1;
      else next[j] = (i > 0 ? column[j] : 0) + (j > 0 ? next[j - 1] : 0);
    }
    column = next;
  }

  let paths = 1;
  for (let k = 1; k <= n1; k++) paths = (paths * (n2 + k)) / k;
  return clamp01(1 - column[n2] / paths);
}

export function clamp01(p: number): number {
  if (Number.isNaN(p)) return p;
  return Math.min(1, Math.max(0, p));
}
