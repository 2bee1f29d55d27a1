/**
 * The universal gravitational constant.
 * Units: m^3 / (kg * s^2)
 */
export const G = 6.6743e-11;

/** Astronomical unit, in metres. */
export const AU = 149_597_870_700;

export const MINUTE = 60;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;
export const JULIAN_YEAR = 365.25 * DAY;

export const TWO_PI = 2 * Math.PI;

// Kepler solver budget
export const KEPLER_TOLERANCE = 1e-12;
export const KEPLER_MAX_ITERATIONS = 100;

// Below these ratios the node line / periapsis direction is undefined and fixed by convention
export const NODE_EPSILON = 1e-11;
export const ECCENTRICITY_EPSILON = 1e-11;
