/**
 * Orbit camera pose around the map origin.
 *
 * rotX is the elevation above the ground plane, rotY the azimuth, both in
 * degrees; zoom is the distance from the origin; fov is the vertical field
 * of view in degrees.
 */

import * as THREE from 'three';

import {
  CAMERA_ASPECT, CAMERA_FOV, DEFAULT_ROT_X, DEFAULT_ROT_Y, DEFAULT_ZOOM,
  FAR_CLIP, MAX_ROT_X, MAX_ZOOM, MIN_ROT_X, MIN_ZOOM, NEAR_CLIP,
} from '../config';
import { clamp } from '../core/math';
import type { CameraPose } from '../types';

export const DEFAULT_CAMERA_POSE: Readonly<CameraPose> = {
  rotX: DEFAULT_ROT_X,
  rotY: DEFAULT_ROT_Y,
  zoom: DEFAULT_ZOOM,
  fov: CAMERA_FOV,
  aspect: CAMERA_ASPECT,
  near: NEAR_CLIP,
  far: FAR_CLIP,
};

export interface CameraLimits {
  minZoom: number;
  maxZoom: number;
  minRotX: number;
  maxRotX: number;
}

export const DEFAULT_CAMERA_LIMITS: Readonly<CameraLimits> = {
  minZoom: MIN_ZOOM,
  maxZoom: MAX_ZOOM,
  minRotX: MIN_ROT_X,
  maxRotX: MAX_ROT_X,
};

export interface CameraBasis {
  eye: THREE.Vector3;
  forward: THREE.Vector3;
  right: THREE.Vector3;
  up: THREE.Vector3;
}

const WORLD_UP = new THREE.Vector3(0, 1, 0);

/** Keep zoom and elevation inside the viewer's limits; azimuth wraps to [0, 360). */
export function clampPose(pose: CameraPose, limits: CameraLimits = DEFAULT_CAMERA_LIMITS): CameraPose {
  return {
    ...pose,
    rotX: clamp(pose.rotX, limits.minRotX, limits.maxRotX),
    rotY: ((pose.rotY % 360) + 360) % 360,
    zoom: clamp(pose.zoom, limits.minZoom, limits.maxZoom),
  };
}

export function cameraEye(pose: CameraPose, target = new THREE.Vector3()): THREE.Vector3 {
  const rx = THREE.MathUtils.degToRad(pose.rotX);
  const ry = THREE.MathUtils.degToRad(pose.rotY);
  return target.set(
    pose.zoom * Math.sin(ry) * Math.cos(rx),
    pose.zoom * Math.sin(rx),
    pose.zoom * Math.cos(ry) * Math.cos(rx),
  );
}

/**
 * Eye plus an orthonormal right-handed basis looking at the origin.
 * A camera sitting on the origin looks down -z; one straight above the
 * origin keeps the right vector its azimuth implies.
 */
export function cameraBasis(pose: CameraPose): CameraBasis {
  const eye = cameraEye(pose);
  const forward = eye.clone().negate();
  if (forward.lengthSq() > 0) forward.normalize();
  else forward.set(0, 0, -1);

  const right = new THREE.Vector3().crossVectors(forward, WORLD_UP);
  if (right.lengthSq() > 1e-12) {
    right.normalize();
  } else {
    const ry = THREE.MathUtils.degToRad(pose.rotY);
    right.set(Math.cos(ry), 0, -Math.sin(ry));
  }

  const up = new THREE.Vector3().crossVectors(right, forward).normalize();
  return { eye, forward, right, up };
}

/**
 * Corners of the perspective view volume: near bottom-left, bottom-right,
 * top-right, top-left, then the same four on the far plane.
 */
export function viewVolumeCorners(pose: CameraPose, basis: CameraBasis = cameraBasis(pose)): THREE.Vector3[] {
  const tanV = Math.tan(THREE.MathUtils.degToRad(pose.fov) / 2);
  const corners: THREE.Vector3[] = [];
  for (const dist of [pose.near, pose.far]) {
    const halfH = dist * tanV;
    const halfW = halfH * pose.aspect;
    const center = basis.eye.clone().addScaledVector(basis.forward, dist);
    for (const [sx, sy] of [[-1, -1], [1, -1], [1, 1], [-1, 1]] as const) {
      corners.push(
        center.clone()
          .addScaledVector(basis.right, sx * halfW)
          .addScaledVector(basis.up, sy * halfH),
      );
    }
  }
  return corners;
}

/** A three.js camera matching `pose`, for callers that render or extract from matrices. */
export function toPerspectiveCamera(pose: CameraPose): THREE.PerspectiveCamera {
  const camera = new THREE.PerspectiveCamera(pose.fov, pose.aspect, pose.near, pose.far);
  camera.position.copy(cameraEye(pose));
  camera.lookAt(0, 0, 0);
  camera.updateMatrixWorld(true);
  camera.updateProjectionMatrix();
  return camera;
}
