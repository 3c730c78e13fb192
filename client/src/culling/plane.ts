import * as THREE from 'three';

/**
 * Plane a·x + b·y + c·z + d = 0 with a unit normal pointing into the
 * visible half-space. A plane whose normal has no length is permissive:
 * every point sits at distance 0 on its visible side.
 */
export class Plane {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;

  private constructor(a: number, b: number, c: number, d: number) {
    this.a = a;
    this.b = b;
    this.c = c;
    this.d = d;
  }

  static readonly PERMISSIVE = new Plane(0, 0, 0, 0);

  /** Normalizes (a, b, c, d) by the length of (a, b, c). */
  static of(a: number, b: number, c: number, d: number): Plane {
    const length = Math.sqrt(a * a + b * b + c * c);
    if (!(length > 0) || !Number.isFinite(length)) return Plane.PERMISSIVE;
    return new Plane(a / length, b / length, c / length, d / length);
  }

  /** Plane through `point` facing along `normal`. */
  static fromNormalAndPoint(normal: THREE.Vector3, point: THREE.Vector3): Plane {
    return Plane.of(normal.x, normal.y, normal.z, -normal.dot(point));
  }

  get isPermissive(): boolean {
    return this.a === 0 && this.b === 0 && this.c === 0;
  }

  distanceTo(x: number, y: number, z: number): number {
    return this.a * x + this.b * y + this.c * z + this.d;
  }

  normal(target = new THREE.Vector3()): THREE.Vector3 {
    return target.set(this.a, this.b, this.c);
  }
}
