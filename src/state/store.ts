import { atom, createStore } from 'jotai/vanilla';
import { Scene } from '../physics/Scene';
import { Camera, CameraSettings, DEFAULT_CAMERA_SETTINGS, RenderedImage } from '../physics/Camera';
import { createRandomSource, createSeededRandom } from '../physics/random';
import type { PresetResult } from '../presets/types';
import type { SceneFile } from './sceneFile';

// Presets
import { createThreeSpheresScene } from '../presets/threeSpheres';
import { createRandomSpheresScene } from '../presets/randomSpheres';

// Preset Management
export enum PresetName {
    ThreeSpheres = "three-spheres",
    RandomSpheres = "random-spheres"
}

const presetFactories = new Map<PresetName, (seed: number | null) => PresetResult>([
    [PresetName.ThreeSpheres, () => createThreeSpheresScene()],
    [PresetName.RandomSpheres, (seed) => createRandomSpheresScene(seed ?? undefined)],
]);

export function isPresetName(value: string): value is PresetName {
    return (Object.values(PresetName) as string[]).includes(value);
}

// 1. Scene and camera
export const activePresetAtom = atom<PresetName | null>(null);
export const sceneAtom = atom<Scene>(new Scene());
export const cameraSettingsAtom = atom<CameraSettings>({ ...DEFAULT_CAMERA_SETTINGS });

/** Camera rebuilt (and validated) whenever its settings change. */
export const cameraAtom = atom((get) => new Camera(get(cameraSettingsAtom)));

// 2. Random seed; null renders with Math.random
export const seedAtom = atom<number | null>(null);

// 3. Last finished render
export const lastImageAtom = atom<RenderedImage | null>(null);

// Action to load a preset: scene plus the camera it was composed for
export const loadPresetAtom = atom(
    null,
    (get, set, presetName: PresetName) => {
        const factory = presetFactories.get(presetName);
        if (!factory) return;
        const result = factory(get(seedAtom));

        set(activePresetAtom, presetName);
        set(sceneAtom, result.scene);
        set(cameraSettingsAtom, { ...DEFAULT_CAMERA_SETTINGS, ...result.camera });
        set(lastImageAtom, null);
    }
);

// Load a parsed scene file; camera keys missing from the file keep their defaults
export const loadSceneAtom = atom(
    null,
    (_get, set, file: SceneFile) => {
        set(activePresetAtom, null);
        set(sceneAtom, file.scene);
        set(cameraSettingsAtom, { ...DEFAULT_CAMERA_SETTINGS, ...file.camera });
        set(lastImageAtom, null);
    }
);

/** Overrides individual camera settings (e.g. from command-line flags). */
export const updateCameraSettingsAtom = atom(
    null,
    (get, set, overrides: Partial<CameraSettings>) => {
        const next: CameraSettings = { ...get(cameraSettingsAtom) };
        for (const [key, value] of Object.entries(overrides)) {
            if (value !== undefined) Object.assign(next, { [key]: value });
        }
        set(cameraSettingsAtom, next);
    }
);

/** Renders the current scene with the current camera and stores the image. */
export const renderAtom = atom(
    null,
    (get, set, onProgress?: (rowsRemaining: number) => void): RenderedImage => {
        const camera = get(cameraAtom);
        const seed = get(seedAtom);
        const rng = seed === null ? createRandomSource() : createSeededRandom(seed);

        const image = camera.render(get(sceneAtom), { rng, onProgress });
        set(lastImageAtom, image);
        return image;
    }
);

export function createRenderStore() {
    return createStore();
}
