import { describe, expect, it } from 'vitest';
import { ValidationError } from '@shared/errors';
import type { Mat3, Vec3 } from '@shared/types';
import { Matrix, angle, chebyshev, cross, dot, fsum, negate, norm, normalize, orientedAngle } from '@shared/vector';
import { PRNG } from './helpers/prng';
import { expectVectorClose } from './helpers/assertions';

function expectMatrixClose(actual: Mat3, expected: Mat3, tolerance = 1e-10): void {
  expect(Matrix.chebyshev(Matrix.subtract(actual, expected))).toBeLessThan(tolerance);
}

function randomVector(rng: PRNG): Vec3 {
  return [rng.nextInRange(-10, 10), rng.nextInRange(-10, 10), rng.nextInRange(-10, 10)];
}

describe('fsum', () => {
  it('should keep small terms that cancel between large ones', () => {
    expect(fsum([1e100, 1, -1e100])).toBe(1);
  });

  it('should round the exact sum once', () => {
    const tenths = new Array<number>(10).fill(0.1);
    expect(tenths.reduce((acc, x) => acc + x, 0)).not.toBe(1);
    expect(fsum(tenths)).toBe(1);
  });

  it('should return 0 for no values', () => {
    expect(fsum([])).toBe(0);
  });

  it('should propagate non-finite values', () => {
    expect(fsum([1, Infinity])).toBe(Infinity);
    expect(fsum([1, NaN])).toBeNaN();
  });
});

describe('vector operations', () => {
  it('should compute easily verified products', () => {
    expect(dot([1, 0, 0], [0, 1, 1])).toBe(0);
    expect(norm([8, 9, 12])).toBe(17);
    expect(cross([0, 1, 0], [1, 0, 0])).toEqual([0, 0, -1]);
  });

  it('should compute products of general vectors', () => {
    expect(dot([1, 4, 7], [2, 5, 8])).toBe(78);
    expect(norm([4, 5, 6])).toBe(Math.sqrt(77));
    expect(cross([9, 8, 7], [2, 3, 1])).toEqual([-13, 5, 11]);
  });

  it('should not modify its operands', () => {
    const u: Vec3 = [1, 2, 3];
    const v: Vec3 = [4, 5, 6];
    cross(u, v);
    negate(u);
    expect(u).toEqual([1, 2, 3]);
    expect(v).toEqual([4, 5, 6]);
  });

  it('should be symmetric in dot and antisymmetric in cross', () => {
    const rng = new PRNG(7);
    for (let i = 0; i < 20; i++) {
      const u = randomVector(rng);
      const v = randomVector(rng);
      expect(dot(u, v)).toBe(dot(v, u));
      expectVectorClose(cross(u, v), negate(cross(v, u)), 1e-15);
      // the cross product is perpendicular to both operands
      const tolerance = 1e-12 * norm(u) * norm(u) * norm(v);
      expect(Math.abs(dot(u, cross(u, v)))).toBeLessThan(tolerance);
      expect(Math.abs(dot(v, cross(u, v)))).toBeLessThan(tolerance);
    }
  });

  it('should normalize to unit length', () => {
    expectVectorClose(normalize([0, 3, 4]), [0, 0.6, 0.8], 1e-15);
    expect(() => normalize([0, 0, 0])).toThrow(ValidationError);
  });

  it('should take the maximum metric', () => {
    expect(chebyshev([1, -7, 3])).toBe(7);
  });
});

describe('angles', () => {
  it('should measure the unsigned angle', () => {
    expect(angle([0, 1, 0], [1, 0, 0])).toBe(Math.PI / 2);
    expect(angle([1, 2, 3], [1, 2, 3])).toBeCloseTo(0, 6);
    expect(angle([1, 2, 3], [-1, -2, -3])).toBeCloseTo(Math.PI, 6);
  });

  it('should sign the angle by the reference normal', () => {
    expect(orientedAngle([0, 1, 0], [1, 0, 0])).toBe(-Math.PI / 2);
    expect(orientedAngle([1, 0, 0], [0, 1, 0])).toBe(Math.PI / 2);
    expect(orientedAngle([4, 7, 5], [3, 5, 8])).toBeCloseTo(-0.3861364787976416, 12);
    expect(orientedAngle([4, 5, 7], [3, 8, 5])).toBeCloseTo(0.3861364787976416, 12);
    expect(orientedAngle([1, 0, 0], [0, 1, 0], [0, 0, -1])).toBe(-Math.PI / 2);
  });

  it('should reject zero-length vectors', () => {
    expect(() => angle([0, 0, 0], [1, 0, 0])).toThrow(ValidationError);
    expect(() => angle([1, 0, 0], [0, 0, 0])).toThrow(ValidationError);
  });
});

describe('Matrix', () => {
  const identity = Matrix.identity();
  const double: Mat3 = [
    [2, 0, 0],
    [0, 2, 0],
    [0, 0, 2],
  ];

  it('should apply easily verified maps', () => {
    expect(Matrix.multiplyVector(identity, [1, 2, 3])).toEqual([1, 2, 3]);
    expect(Matrix.multiplyVector(double, [1, 2, 3])).toEqual([2, 4, 6]);
    expect(Matrix.multiply(identity, identity)).toEqual(identity);
    expect(Matrix.multiply(double, double)).toEqual([
      [4, 0, 0],
      [0, 4, 0],
      [0, 0, 4],
    ]);
  });

  it('should multiply general matrices in order', () => {
    const a: Mat3 = [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ];
    const b: Mat3 = [
      [3, 2, 1],
      [6, 5, 4],
      [9, 8, 7],
    ];
    expect(Matrix.multiply(a, b)).toEqual([
      [42, 36, 30],
      [96, 81, 66],
      [150, 126, 102],
    ]);
    expect(Matrix.multiply(b, a)).toEqual([
      [18, 24, 30],
      [54, 69, 84],
      [90, 114, 138],
    ]);
  });

  it('should transpose', () => {
    expect(
      Matrix.transpose([
        [1, 2, 3],
        [4, 5, 6],
        [7, 8, 9],
      ]),
    ).toEqual([
      [1, 4, 7],
      [2, 5, 8],
      [3, 6, 9],
    ]);
  });

  it('should rotate a quarter turn around X', () => {
    expectMatrixClose(Matrix.rotation(Math.PI / 2, [1, 0, 0]), [
      [1, 0, 0],
      [0, 0, -1],
      [0, 1, 0],
    ]);
    expectMatrixClose(Matrix.rotationDegrees(90, [1, 0, 0]), Matrix.rotation(Math.PI / 2, [1, 0, 0]), 1e-15);
  });

  it('should rotate around a non-unit axis', () => {
    expectMatrixClose(Matrix.rotation(5, [1, 2, 3]), [
      [0.33482917221585295, 0.8711838511445769, -0.3590656248350022],
      [-0.66651590413407, 0.4883301324737331, 0.5632852130622015],
      [0.6660675453507625, 0.050718627969319086, 0.7441650662368666],
    ]);
  });

  it('should turn vectors by the rotation angle', () => {
    const rng = new PRNG(42);
    for (let i = 0; i < 10; i++) {
      const theta = rng.nextInRange(0.01, Math.PI - 0.01);
      const u: Vec3 = [rng.nextInRange(0.1, 1), rng.nextInRange(0.1, 1), 0];
      const v = Matrix.multiplyVector(Matrix.rotation(theta, [0, 0, 1]), u);
      expect(Math.abs(angle(u, v) - theta)).toBeLessThan(1e-6);
    }
  });

  it('should invert a rotation with its transpose or the opposite angle', () => {
    const rotation = Matrix.rotation(1.3, [2, -1, 0.5]);
    expectMatrixClose(Matrix.multiply(rotation, Matrix.transpose(rotation)), identity, 1e-12);
    expectMatrixClose(Matrix.multiply(rotation, Matrix.rotation(-1.3, [2, -1, 0.5])), identity, 1e-12);
  });

  it('should compose Euler angles as Z, then X, then Z', () => {
    expectMatrixClose(Matrix.fromEulerAngles(0, 0, 0), identity, 0.5e-15);
    const [alpha, beta, gamma] = [0.4, 1.1, -2.3];
    const composed = Matrix.multiply(
      Matrix.multiply(Matrix.rotation(alpha, [0, 0, 1]), Matrix.rotation(beta, [1, 0, 0])),
      Matrix.rotation(gamma, [0, 0, 1]),
    );
    expectMatrixClose(Matrix.fromEulerAngles(alpha, beta, gamma), composed, 1e-12);
  });

  it('should reject a zero rotation axis', () => {
    expect(() => Matrix.rotation(1, [0, 0, 0])).toThrow(ValidationError);
  });
});
