import { parseArgs } from 'util';
import { writeFileSync } from 'fs';
import { writePPM } from './output/ppm';
import { loadSceneFile, serializeScene } from './state/sceneFile';
import {
    cameraSettingsAtom,
    createRenderStore,
    isPresetName,
    loadPresetAtom,
    loadSceneAtom,
    PresetName,
    renderAtom,
    sceneAtom,
    seedAtom,
    updateCameraSettingsAtom
} from './state/store';
import type { CameraSettings } from './physics/Camera';
import { asError } from './errors';

export const USAGE = `Usage: render [options]

  --preset <name>      ${Object.values(PresetName).join(' | ')} (default: ${PresetName.ThreeSpheres})
  --scene <file>       load a scene file instead of a preset
  --width <n>          image width in pixels
  --aspect <w/h>       aspect ratio, e.g. 16/9 or 1.5
  --samples <n>        samples per pixel
  --depth <n>          maximum bounce depth
  --seed <n>           seed for reproducible renders
  --output <file>      PPM output path, "-" for stdout (default: image.ppm)
  --save-scene <file>  write the loaded scene and camera as a scene file
  --quiet              no progress output
  --help               show this message
`;

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
    }
    return n;
}

function aspectRatio(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const [w, h] = value.split('/').map(Number);
    const ratio = h === undefined ? w : w / h;
    if (!(ratio > 0) || !Number.isFinite(ratio)) {
        throw new UsageError(`--aspect must be a positive ratio, got "${value}"`);
    }
    return ratio;
}

function parseOptions(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            options: {
                preset: { type: 'string' },
                scene: { type: 'string' },
                width: { type: 'string' },
                aspect: { type: 'string' },
                samples: { type: 'string' },
                depth: { type: 'string' },
                seed: { type: 'string' },
                output: { type: 'string', default: 'image.ppm' },
                'save-scene': { type: 'string' },
                quiet: { type: 'boolean', default: false },
                help: { type: 'boolean', default: false }
            },
            strict: true
        });
    } catch (error) {
        throw new UsageError(asError(error).message);
    }
}

/** Runs the renderer with command-line arguments. Returns the process exit code. */
export function run(argv: string[]): number {
    const { values } = parseOptions(argv);

    if (values.help) {
        console.log(USAGE);
        return 0;
    }

    if (values.preset !== undefined && values.scene !== undefined) {
        throw new UsageError('--preset and --scene cannot be combined');
    }

    const store = createRenderStore();

    if (values.seed !== undefined) {
        const seed = Number(values.seed);
        if (!Number.isInteger(seed)) throw new UsageError(`--seed must be an integer, got "${values.seed}"`);
        store.set(seedAtom, seed);
    }

    if (values.scene !== undefined) {
        store.set(loadSceneAtom, loadSceneFile(values.scene));
    } else {
        const preset = values.preset ?? PresetName.ThreeSpheres;
        if (!isPresetName(preset)) {
            throw new UsageError(`Unknown preset "${preset}"`);
        }
        store.set(loadPresetAtom, preset);
    }

    const overrides: Partial<CameraSettings> = {
        imageWidth: positiveInt('width', values.width),
        aspectRatio: aspectRatio(values.aspect),
        samplesPerPixel: positiveInt('samples', values.samples),
        maxDepth: positiveInt('depth', values.depth)
    };
    store.set(updateCameraSettingsAtom, overrides);

    const saveScene = values['save-scene'];
    if (saveScene !== undefined) {
        writeFileSync(saveScene, serializeScene(store.get(sceneAtom), store.get(cameraSettingsAtom)));
        if (!values.quiet) console.error(`Scene written to ${saveScene}`);
    }

    const onProgress = values.quiet
        ? undefined
        : (rowsRemaining: number) => console.error(`Scanlines remaining: ${rowsRemaining}`);

    const started = Date.now();
    const image = store.set(renderAtom, onProgress);
    writePPM(image, values.output ?? 'image.ppm');

    if (!values.quiet) {
        console.error(`Done. ${image.width}x${image.height} in ${((Date.now() - started) / 1000).toFixed(1)}s`);
    }
    return 0;
}
