// Closed-form projections of the nominal point (all multipliers = 1) onto a linear constraint

/** Projection of point (1, 1) onto the line a·x + b·y = c. */
export function projectToLine(a: number, b: number, c: number): [x: number, y: number] {
    const dot = a * a + b * b;
    if (dot === 0) return [1, 1];

    const x = (b * b - a * b + a * c) / dot;
    const y = (a * a - a * b + b * c) / dot;
    return [x, y];
}

/** Projection of point (1, 1, 1) onto the plane a·x + b·y + c·z = d. */
export function projectToPlane(a: number, b: number, c: number, d: number): [x: number, y: number, z: number] {
    const dot = a * a + b * b + c * c;
    if (dot === 0) return [1, 1, 1];

    const x = (b * b + c * c - a * (b + c - d)) / dot;
    const y = (a * a + c * c - b * (a + c - d)) / dot;
    const z = (a * a + b * b - c * (a + b - d)) / dot;
    return [x, y, z];
}
