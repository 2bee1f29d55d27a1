import { vec3 } from 'gl-matrix';
import { ValidationError } from './errors';
import type { Mat3, Vec3 } from './types';

/**
 * 3D linear algebra on plain tuples. Every function returns a new value and
 * leaves its operands untouched; gl-matrix does the componentwise work,
 * writing into fresh tuples so that results stay in double precision.
 */

const Z_AXIS: Vec3 = [0, 0, 1];

/** Exactly rounded sum, using Shewchuk's non-overlapping partials. */
export function fsum(values: readonly number[]): number {
	if (!values.every(Number.isFinite)) {
		return values.reduce((acc, x) => acc + x, 0);
	}

	const partials: number[] = [];
	for (let x of values) {
		let i = 0;
		for (let y of partials) {
			if (Math.abs(x) < Math.abs(y)) {
				[x, y] = [y, x];
			}
			const hi = x + y;
			const lo = y - (hi - x);
			if (lo !== 0) {
				partials[i++] = lo;
			}
			x = hi;
		}
		partials.length = i;
		partials.push(x);
	}

	let n = partials.length;
	if (n === 0) return 0;
	let hi = partials[--n];
	let lo = 0;
	while (n > 0) {
		const x = hi;
		const y = partials[--n];
		hi = x + y;
		lo = y - (hi - x);
		if (lo !== 0) break;
	}
	// Round half-even across the remaining partials
	if (n > 0 && ((lo < 0 && partials[n - 1] < 0) || (lo > 0 && partials[n - 1] > 0))) {
		const y = lo * 2;
		const x = hi + y;
		if (y === x - hi) {
			hi = x;
		}
	}
	return hi;
}

export function dot(u: Vec3, v: Vec3): number {
	return fsum([u[0] * v[0], u[1] * v[1], u[2] * v[2]]);
}

export function cross(u: Vec3, v: Vec3): Vec3 {
	const out: Vec3 = [0, 0, 0];
	vec3.cross(out, u, v);
	return out;
}

export function norm(u: Vec3): number {
	return Math.sqrt(dot(u, u));
}

export function add(u: Vec3, v: Vec3): Vec3 {
	const out: Vec3 = [0, 0, 0];
	vec3.add(out, u, v);
	return out;
}

export function subtract(u: Vec3, v: Vec3): Vec3 {
	const out: Vec3 = [0, 0, 0];
	vec3.subtract(out, u, v);
	return out;
}

export function scale(u: Vec3, s: number): Vec3 {
	const out: Vec3 = [0, 0, 0];
	vec3.scale(out, u, s);
	return out;
}

export function negate(u: Vec3): Vec3 {
	const out: Vec3 = [0, 0, 0];
	vec3.negate(out, u);
	return out;
}

function requireNonZero(u: Vec3, what: string): number {
	const length = norm(u);
	if (length === 0) {
		throw new ValidationError(`${what} must not be a zero-length vector`);
	}
	return length;
}

export function normalize(u: Vec3): Vec3 {
	return scale(u, 1 / requireNonZero(u, 'vector'));
}

/** Unsigned angle between two vectors, in [0, pi]. */
export function angle(u: Vec3, v: Vec3): number {
	const cosine = dot(u, v) / requireNonZero(u, 'first vector') / requireNonZero(v, 'second vector');
	// Rounding can push the cosine just outside [-1, 1]
	return Math.acos(Math.max(-1, Math.min(1, cosine)));
}

/** Angle from u to v, negative when u x v points away from `normal`. */
export function orientedAngle(u: Vec3, v: Vec3, normal: Vec3 = Z_AXIS): number {
	const geometric = angle(u, v);
	return dot(normal, cross(u, v)) < 0 ? -geometric : geometric;
}

/** Maximum metric (Chebyshev distance from the origin). */
export function chebyshev(u: Vec3): number {
	return Math.max(Math.abs(u[0]), Math.abs(u[1]), Math.abs(u[2]));
}

export const Matrix = {
	identity(): Mat3 {
		return [
			[1, 0, 0],
			[0, 1, 0],
			[0, 0, 1],
		];
	},

	/** Linear map of a vector, unrolled for the 3x3 case. */
	multiplyVector(m: Mat3, v: Vec3): Vec3 {
		const [[a, b, c], [d, e, f], [g, h, i]] = m;
		const [x, y, z] = v;
		return [
			a * x + b * y + c * z,
			d * x + e * y + f * z,
			g * x + h * y + i * z,
		];
	},

	multiply(a: Mat3, b: Mat3): Mat3 {
		const columns = Matrix.transpose(b);
		const row = (r: Vec3): Vec3 => Matrix.multiplyVector(columns, r);
		return [row(a[0]), row(a[1]), row(a[2])];
	},

	transpose(m: Mat3): Mat3 {
		return [
			[m[0][0], m[1][0], m[2][0]],
			[m[0][1], m[1][1], m[2][1]],
			[m[0][2], m[1][2], m[2][2]],
		];
	},

	subtract(a: Mat3, b: Mat3): Mat3 {
		return [subtract(a[0], b[0]), subtract(a[1], b[1]), subtract(a[2], b[2])];
	},

	/** Largest absolute entry. */
	chebyshev(m: Mat3): number {
		return Math.max(chebyshev(m[0]), chebyshev(m[1]), chebyshev(m[2]));
	},

	/**
	 * Rotation of `angle` radians around `axis` (Rodrigues' formula).
	 * The axis need not be a unit vector.
	 */
	rotation(angle: number, axis: Vec3): Mat3 {
		const [x, y, z] = normalize(axis);
		const s = Math.sin(angle);
		const c = Math.cos(angle);
		const t = 1 - c;
		return [
			[x * x * t + c, x * y * t - z * s, x * z * t + y * s],
			[y * x * t + z * s, y * y * t + c, y * z * t - x * s],
			[z * x * t - y * s, z * y * t + x * s, z * z * t + c],
		];
	},

	rotationDegrees(angle: number, axis: Vec3): Mat3 {
		return Matrix.rotation((angle * Math.PI) / 180, axis);
	},

	/** Rotation matrix from Z1-X2-Z3 intrinsic Euler angles. */
	fromEulerAngles(alpha: number, beta: number, gamma: number): Mat3 {
		const c1 = Math.cos(alpha), s1 = Math.sin(alpha);
		const c2 = Math.cos(beta), s2 = Math.sin(beta);
		const c3 = Math.cos(gamma), s3 = Math.sin(gamma);
		return [
			[c1 * c3 - c2 * s1 * s3, -c1 * s3 - c2 * c3 * s1, s1 * s2],
			[c3 * s1 + c1 * c2 * s3, c1 * c2 * c3 - s1 * s3, -c1 * s2],
			[s2 * s3, c3 * s2, c2],
		];
	},
};
