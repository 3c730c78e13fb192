/**
 * Six-plane view frustum for visibility tests.
 *
 * Built either from the orbit camera's parameters or from a projection and
 * model-view matrix pair. Tests are conservative: an object straddling a
 * plane, or one whose distance cannot be computed (NaN), counts as visible.
 */

import * as THREE from 'three';

import { createLogger } from '../core/logger';
import type { CameraPose } from '../types';
import { BoundingBox } from '../spatial/boundingBox';
import { cameraBasis, viewVolumeCorners } from './camera';
import { Plane } from './plane';

const log = createLogger('Frustum');

export type FrustumPlaneName = 'near' | 'far' | 'left' | 'right' | 'top' | 'bottom';

export type FrustumPlanes = Readonly<Record<FrustumPlaneName, Plane>>;

export const FRUSTUM_PLANE_ORDER: readonly FrustumPlaneName[] = ['near', 'far', 'left', 'right', 'top', 'bottom'];

export interface FromCameraOptions {
  /**
   * `permissive` (default) leaves top and bottom always passing, which suits
   * a near-flat field of features seen from above; `full` builds both planes.
   */
  verticalPlanes?: 'permissive' | 'full';
}

/** normal · p + offset >= 0 */
interface HalfSpace {
  normal: THREE.Vector3;
  offset: number;
}

const SOLVE_EPSILON = 1e-12;
const INSIDE_EPSILON = 1e-7;
const WORLD_UP = new THREE.Vector3(0, 1, 0);
const WORLD_DOWN = new THREE.Vector3(0, -1, 0);

function inside(bounds: readonly HalfSpace[], p: THREE.Vector3): boolean {
  return bounds.every((h) => h.normal.dot(p) + h.offset >= -INSIDE_EPSILON * (1 + Math.abs(h.offset)));
}

/** True when the region recedes forever along `dir`. */
function recedesAlong(bounds: readonly HalfSpace[], dir: THREE.Vector3): boolean {
  return bounds.every((h) => h.normal.dot(dir) >= -INSIDE_EPSILON);
}

/**
 * Vertices of the convex region bounded by `bounds`, or null when the region
 * is unbounded. Every recession direction of a region in 3D lies along the
 * cross product of two of its normals, so checking those pairs is enough.
 */
function regionVertices(bounds: readonly HalfSpace[]): THREE.Vector3[] | null {
  const dir = new THREE.Vector3();
  for (let i = 0; i < bounds.length; i++) {
    for (let j = i + 1; j < bounds.length; j++) {
      const a = bounds[i];
      const b = bounds[j];
      if (!a || !b) continue;
      dir.crossVectors(a.normal, b.normal);
      if (dir.lengthSq() < SOLVE_EPSILON) continue;
      dir.normalize();
      if (recedesAlong(bounds, dir) || recedesAlong(bounds, dir.negate())) return null;
    }
  }

  const vertices: THREE.Vector3[] = [];
  const bc = new THREE.Vector3();
  const ca = new THREE.Vector3();
  const ab = new THREE.Vector3();
  let spans = false;
  for (let i = 0; i < bounds.length; i++) {
    for (let j = i + 1; j < bounds.length; j++) {
      for (let k = j + 1; k < bounds.length; k++) {
        const a = bounds[i];
        const b = bounds[j];
        const c = bounds[k];
        if (!a || !b || !c) continue;
        bc.crossVectors(b.normal, c.normal);
        const det = a.normal.dot(bc);
        if (Math.abs(det) < SOLVE_EPSILON) continue;
        spans = true;
        ca.crossVectors(c.normal, a.normal);
        ab.crossVectors(a.normal, b.normal);
        const p = bc.clone().multiplyScalar(a.offset)
          .addScaledVector(ca, b.offset)
          .addScaledVector(ab, c.offset)
          .multiplyScalar(-1 / det);
        if (inside(bounds, p)) vertices.push(p);
      }
    }
  }
  // Normals confined to a plane leave a whole line of freedom.
  return spans ? vertices : null;
}

const PERMISSIVE_PLANES: FrustumPlanes = {
  near: Plane.PERMISSIVE,
  far: Plane.PERMISSIVE,
  left: Plane.PERMISSIVE,
  right: Plane.PERMISSIVE,
  top: Plane.PERMISSIVE,
  bottom: Plane.PERMISSIVE,
};

/** `unknown`: no view volume to clip; `empty`: the volume never enters the slab. */
export type GroundFootprint =
  | { kind: 'unknown' }
  | { kind: 'empty' }
  | { kind: 'box'; box: BoundingBox };

function isFiniteVector(v: THREE.Vector3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

export class ViewFrustum {
  readonly planes: FrustumPlanes;
  /** Camera position, when it could be recovered. */
  readonly eye: THREE.Vector3 | null;
  /** The 8 corners of the view volume, when they could be recovered. */
  readonly corners: readonly THREE.Vector3[] | null;
  /** False for a frustum that was never extracted; such a frustum sees everything. */
  readonly extracted: boolean;
  private readonly ordered: readonly Plane[];

  private constructor(
    planes: FrustumPlanes,
    eye: THREE.Vector3 | null,
    corners: readonly THREE.Vector3[] | null,
    extracted: boolean,
  ) {
    this.planes = planes;
    this.eye = eye && isFiniteVector(eye) ? eye : null;
    this.corners = corners && corners.every(isFiniteVector) ? corners : null;
    this.extracted = extracted;
    this.ordered = FRUSTUM_PLANE_ORDER.map((name) => planes[name]);
  }

  static permissive(): ViewFrustum {
    return new ViewFrustum(PERMISSIVE_PLANES, null, null, false);
  }

  static fromCamera(pose: CameraPose, options: FromCameraOptions = {}): ViewFrustum {
    const basis = cameraBasis(pose);
    const { eye, forward, right, up } = basis;
    const halfV = THREE.MathUtils.degToRad(pose.fov) / 2;
    const halfH = Math.atan(Math.tan(halfV) * pose.aspect);

    const nearPoint = eye.clone().addScaledVector(forward, pose.near);
    const farPoint = eye.clone().addScaledVector(forward, pose.far);

    // Side normals: the right (or up) axis tilted toward forward by the half-angle.
    const sideNormal = (axis: THREE.Vector3, sign: 1 | -1, half: number): THREE.Vector3 =>
      axis.clone().multiplyScalar(sign * Math.cos(half)).addScaledVector(forward, Math.sin(half));

    const vertical = options.verticalPlanes ?? 'permissive';
    const planes: FrustumPlanes = {
      near: Plane.fromNormalAndPoint(forward, nearPoint),
      far: Plane.fromNormalAndPoint(forward.clone().negate(), farPoint),
      left: Plane.fromNormalAndPoint(sideNormal(right, 1, halfH), eye),
      right: Plane.fromNormalAndPoint(sideNormal(right, -1, halfH), eye),
      top: vertical === 'full' ? Plane.fromNormalAndPoint(sideNormal(up, -1, halfV), eye) : Plane.PERMISSIVE,
      bottom: vertical === 'full' ? Plane.fromNormalAndPoint(sideNormal(up, 1, halfV), eye) : Plane.PERMISSIVE,
    };

    return new ViewFrustum(planes, eye, viewVolumeCorners(pose, basis), true);
  }

  /**
   * Gribb-Hartmann extraction from clip = projection · modelView, with
   * three.js (column-vector, OpenGL depth range) conventions.
   */
  static fromMatrices(projection: THREE.Matrix4, modelView: THREE.Matrix4): ViewFrustum {
    const clip = new THREE.Matrix4().multiplyMatrices(projection, modelView);
    const e = clip.elements;
    const row = (r: number): [number, number, number, number] => [
      e[r] ?? 0, e[r + 4] ?? 0, e[r + 8] ?? 0, e[r + 12] ?? 0,
    ];
    const [r0, r1, r2, r3] = [row(0), row(1), row(2), row(3)];
    const combine = (sign: 1 | -1, other: [number, number, number, number]): Plane =>
      Plane.of(
        r3[0] + sign * other[0],
        r3[1] + sign * other[1],
        r3[2] + sign * other[2],
        r3[3] + sign * other[3],
      );

    const planes: FrustumPlanes = {
      left: combine(1, r0),
      right: combine(-1, r0),
      bottom: combine(1, r1),
      top: combine(-1, r1),
      near: combine(1, r2),
      far: combine(-1, r2),
    };

    let eye: THREE.Vector3 | null = null;
    if (modelView.determinant() !== 0) {
      eye = new THREE.Vector3().setFromMatrixPosition(modelView.clone().invert());
    }

    let corners: THREE.Vector3[] | null = null;
    if (clip.determinant() !== 0) {
      const inverse = clip.clone().invert();
      corners = [];
      for (const z of [-1, 1]) {
        for (const [x, y] of [[-1, -1], [1, -1], [1, 1], [-1, 1]] as const) {
          corners.push(new THREE.Vector3(x, y, z).applyMatrix4(inverse));
        }
      }
    } else {
      log.warn('singular clip matrix; view volume unavailable');
    }

    return new ViewFrustum(planes, eye, corners, true);
  }

  plane(name: FrustumPlaneName): Plane {
    return this.planes[name];
  }

  get isPermissive(): boolean {
    return this.ordered.every((p) => p.isPermissive);
  }

  isPointVisible(x: number, y: number, z: number): boolean {
    for (const plane of this.ordered) {
      if (plane.distanceTo(x, y, z) < 0) return false;
    }
    return true;
  }

  /** Visible unless the sphere lies entirely behind some plane. */
  isSphereVisible(x: number, y: number, z: number, radius: number): boolean {
    for (const plane of this.ordered) {
      if (plane.distanceTo(x, y, z) < -radius) return false;
    }
    return true;
  }

  /** Positive-vertex test: the box corner furthest along each plane normal. */
  isAabbVisible(
    minX: number, minY: number, minZ: number,
    maxX: number, maxY: number, maxZ: number,
  ): boolean {
    for (const plane of this.ordered) {
      const px = plane.a >= 0 ? maxX : minX;
      const py = plane.b >= 0 ? maxY : minY;
      const pz = plane.c >= 0 ? maxZ : minZ;
      if (plane.distanceTo(px, py, pz) < 0) return false;
    }
    return true;
  }

  /**
   * Ground-plane box holding every point with height in [yMin, yMax] that
   * passes the plane tests as the centre of a sphere of radius `reach`,
   * grown by `margin`. Only the planes the sphere test applies bound it, so
   * with permissive top and bottom planes the box follows the side planes
   * up and down through the whole slab.
   *
   * `unknown` when there is no view volume or the region is unbounded.
   */
  groundFootprint(yMin: number, yMax: number, margin = 0, reach = 0): GroundFootprint {
    if (!this.corners || !Number.isFinite(yMin) || !Number.isFinite(yMax) || !Number.isFinite(reach)) {
      return { kind: 'unknown' };
    }
    if (yMin > yMax) return { kind: 'empty' };

    const bounds: HalfSpace[] = [
      { normal: WORLD_UP, offset: -yMin },
      { normal: WORLD_DOWN, offset: yMax },
    ];
    for (const plane of this.ordered) {
      if (!plane.isPermissive) bounds.push({ normal: plane.normal(), offset: plane.d + reach });
    }

    const vertices = regionVertices(bounds);
    if (!vertices) return { kind: 'unknown' };
    const box = BoundingBox.enclosing(vertices);
    return box ? { kind: 'box', box: box.expand(margin) } : { kind: 'empty' };
  }
}

/** Frustum for the orbit camera; the pipeline's usual entry point. */
export function updateCamera(pose: CameraPose, options: FromCameraOptions = {}): ViewFrustum {
  return ViewFrustum.fromCamera(pose, options);
}
