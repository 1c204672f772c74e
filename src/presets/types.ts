import type { Scene } from '../physics/Scene';
import type { CameraSettings } from '../physics/Camera';

/** Scene plus the camera settings it was composed for. */
export interface PresetResult {
    scene: Scene;
    camera: Partial<CameraSettings>;
}
