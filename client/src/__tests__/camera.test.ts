import { describe, expect, it } from 'vitest';

import { DEFAULT_CAMERA_POSE, cameraBasis, cameraEye, clampPose, toPerspectiveCamera, viewVolumeCorners } from '../culling/camera';

describe('orbit camera', () => {
  it('clamps elevation and zoom and wraps the azimuth', () => {
    const pose = clampPose({ ...DEFAULT_CAMERA_POSE, rotX: 95, rotY: -30, zoom: 0.5 });
    expect(pose.rotX).toBe(80);
    expect(pose.rotY).toBe(330);
    expect(pose.zoom).toBe(1.5);
    expect(clampPose({ ...DEFAULT_CAMERA_POSE, rotY: 720 }).rotY).toBe(0);
  });

  it('places the eye on a sphere around the origin', () => {
    const eye = cameraEye({ ...DEFAULT_CAMERA_POSE, rotX: 0, rotY: 0, zoom: 2 });
    expect(eye.x).toBeCloseTo(0, 10);
    expect(eye.y).toBeCloseTo(0, 10);
    expect(eye.z).toBeCloseTo(2, 10);

    const above = cameraEye({ ...DEFAULT_CAMERA_POSE, rotX: 90, rotY: 0, zoom: 3 });
    expect(above.y).toBeCloseTo(3, 10);
  });

  it('builds an orthonormal basis looking at the origin', () => {
    const { eye, forward, right, up } = cameraBasis(DEFAULT_CAMERA_POSE);
    expect(forward.dot(eye.clone().normalize())).toBeCloseTo(-1, 10);
    expect(forward.dot(right)).toBeCloseTo(0, 10);
    expect(forward.dot(up)).toBeCloseTo(0, 10);
    expect(right.dot(up)).toBeCloseTo(0, 10);
    expect(right.y).toBeCloseTo(0, 10);
    expect(up.y).toBeGreaterThan(0);
  });

  it('keeps a right vector when looking straight down', () => {
    const { right, up } = cameraBasis({ ...DEFAULT_CAMERA_POSE, rotX: 90, rotY: 0, zoom: 2 });
    expect(right.x).toBeCloseTo(1, 10);
    expect(right.z).toBeCloseTo(0, 10);
    expect(up.z).toBeCloseTo(-1, 10);
  });

  it('lists near corners before far corners', () => {
    const pose = { ...DEFAULT_CAMERA_POSE, near: 1, far: 10 };
    const { eye, forward } = cameraBasis(pose);
    const corners = viewVolumeCorners(pose);
    expect(corners).toHaveLength(8);
    for (const [i, corner] of corners.entries()) {
      const depth = corner.clone().sub(eye).dot(forward);
      expect(depth).toBeCloseTo(i < 4 ? 1 : 10, 8);
    }
  });

  it('creates a matching three.js camera', () => {
    const camera = toPerspectiveCamera(DEFAULT_CAMERA_POSE);
    const eye = cameraEye(DEFAULT_CAMERA_POSE);
    expect(camera.position.distanceTo(eye)).toBeCloseTo(0, 10);
    expect(camera.fov).toBe(DEFAULT_CAMERA_POSE.fov);
    expect(camera.near).toBe(DEFAULT_CAMERA_POSE.near);
  });
});
