/**
 * Scene files: save/load scenes as plain text.
 *
 * Format: one block per material, sphere or camera, separated by blank lines.
 * Lines starting with # are comments.
 * Each block starts with [Type] and lists key = value pairs; vectors and
 * colors are written "x, y, z". Spheres refer to materials by name, so one
 * material can be shared by many spheres.
 *
 *   [Lambertian]
 *   name = ground
 *   albedo = 0.8, 0.8, 0
 *
 *   [Sphere]
 *   name = Ground
 *   center = 0, -100.5, -1
 *   radius = 100
 *   material = ground
 */

import { readFileSync } from 'fs';
import { Color, Vector3 } from 'three';
import { Scene } from '../physics/Scene';
import { Sphere } from '../physics/components/Sphere';
import { SceneObject } from '../physics/Component';
import { Material } from '../physics/Material';
import { Lambertian } from '../physics/materials/Lambertian';
import { Metal } from '../physics/materials/Metal';
import { Dielectric } from '../physics/materials/Dielectric';
import type { CameraSettings } from '../physics/Camera';
import { RethrownError, SceneFileError, asError } from '../errors';

export interface SceneFile {
    scene: Scene;
    materials: Material[];
    camera: Partial<CameraSettings>;
}

// ════════════════════════════════════════════════════════════
//  SERIALIZE
// ════════════════════════════════════════════════════════════

export function serializeScene(scene: Scene, camera?: Partial<CameraSettings>): string {
    const lines: string[] = [];
    lines.push('# Sphere scene');
    lines.push(`# Saved: ${new Date().toISOString()}`);
    lines.push('');

    if (camera) {
        writeCamera(camera, lines);
    }

    const spheres: Sphere[] = [];
    for (const object of scene.objects) {
        if (object instanceof Sphere) {
            spheres.push(object);
        } else if (object instanceof SceneObject) {
            console.warn(`SceneFile: skipping "${object.name}" (${object.id}), only spheres are saved`);
        } else {
            console.warn('SceneFile: skipping an object that is not a sphere');
        }
    }

    // Shared materials are written once; clashing names get a numeric suffix
    const materialNames = new Map<Material, string>();
    const usedNames = new Set<string>();
    for (const sphere of spheres) {
        if (materialNames.has(sphere.material)) continue;
        let name = sphere.material.name;
        for (let n = 2; usedNames.has(name); n++) {
            name = `${sphere.material.name}_${n}`;
        }
        usedNames.add(name);
        materialNames.set(sphere.material, name);
        writeMaterial(sphere.material, name, lines);
    }

    for (const sphere of spheres) {
        lines.push('[Sphere]');
        lines.push(`name = ${sphere.name}`);
        lines.push(`center = ${vec(sphere.center)}`);
        lines.push(`radius = ${fmt(sphere.radius)}`);
        lines.push(`material = ${materialNames.get(sphere.material)}`);
        lines.push('');
    }

    return lines.join('\n');
}

function fmt(n: number): string {
    // Remove trailing zeros, max 8 decimal places
    return parseFloat(n.toFixed(8)).toString();
}

function vec(v: Vector3): string {
    return `${fmt(v.x)}, ${fmt(v.y)}, ${fmt(v.z)}`;
}

function rgb(c: Color): string {
    return `${fmt(c.r)}, ${fmt(c.g)}, ${fmt(c.b)}`;
}

function writeMaterial(material: Material, name: string, lines: string[]) {
    if (material instanceof Lambertian) {
        lines.push('[Lambertian]');
        lines.push(`name = ${name}`);
        lines.push(`albedo = ${rgb(material.albedo)}`);
    } else if (material instanceof Metal) {
        lines.push('[Metal]');
        lines.push(`name = ${name}`);
        lines.push(`albedo = ${rgb(material.albedo)}`);
        lines.push(`fuzz = ${fmt(material.fuzz)}`);
    } else if (material instanceof Dielectric) {
        lines.push('[Dielectric]');
        lines.push(`name = ${name}`);
        lines.push(`refractionIndex = ${fmt(material.refractionIndex)}`);
    } else {
        throw new SceneFileError(`cannot serialize material "${material.name}" (${material.id})`);
    }
    lines.push('');
}

function writeCamera(camera: Partial<CameraSettings>, lines: string[]) {
    lines.push('[Camera]');
    for (const key of NUMBER_KEYS) {
        const value = camera[key];
        if (value !== undefined) lines.push(`${key} = ${fmt(value)}`);
    }
    for (const key of VECTOR_KEYS) {
        const value = camera[key];
        if (value !== undefined) lines.push(`${key} = ${vec(value)}`);
    }
    lines.push('');
}

// ════════════════════════════════════════════════════════════
//  DESERIALIZE
// ════════════════════════════════════════════════════════════

const NUMBER_KEYS = [
    'aspectRatio', 'imageWidth', 'samplesPerPixel', 'maxDepth', 'vfov', 'defocusAngle', 'focusDist'
] as const;
const VECTOR_KEYS = ['lookFrom', 'lookAt', 'vup'] as const;

interface Prop { value: string; line: number }
interface PropMap { [key: string]: Prop | undefined }
interface Block { type: string; line: number; props: PropMap }

export function parseSceneFile(text: string): SceneFile {
    const blocks = parseBlocks(text);
    const materials = new Map<string, Material>();
    const camera: Partial<CameraSettings> = {};
    const sphereBlocks: Block[] = [];

    // Materials first, so spheres may reference materials defined further down
    for (const block of blocks) {
        switch (block.type) {
            case 'Lambertian':
            case 'Metal':
            case 'Dielectric': {
                const material = createMaterial(block);
                if (materials.has(material.name)) {
                    throw new SceneFileError(`duplicate material name "${material.name}"`, block.line);
                }
                materials.set(material.name, material);
                break;
            }
            case 'Sphere':
                sphereBlocks.push(block);
                break;
            case 'Camera':
                readCamera(block, camera);
                break;
            default:
                console.warn(`SceneFile: Unknown block type "${block.type}" at line ${block.line}, skipping`);
        }
    }

    const scene = new Scene();
    for (const block of sphereBlocks) {
        const ref = block.props['material'];
        if (!ref) {
            throw new SceneFileError('sphere has no material', block.line);
        }
        const material = materials.get(ref.value);
        if (!material) {
            throw new SceneFileError(`unknown material "${ref.value}"`, ref.line);
        }
        scene.add(new Sphere(
            vector(block.props, 'center', new Vector3(0, 0, 0)),
            num(block.props, 'radius', 1),
            material,
            str(block.props, 'name', 'Sphere')
        ));
    }

    return { scene, materials: Array.from(materials.values()), camera };
}

/** Reads and parses a scene file from disk. */
export function loadSceneFile(path: string): SceneFile {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (error) {
        throw new RethrownError(`Failed to read scene file: ${path}`, asError(error));
    }
    return parseSceneFile(text);
}

function parseBlocks(text: string): Block[] {
    const blocks: Block[] = [];
    let current: Block | null = null;
    const rawLines = text.split('\n');

    for (let i = 0; i < rawLines.length; i++) {
        const line = rawLines[i].trim();
        const lineNo = i + 1;

        // Skip comments and empty lines
        if (line.startsWith('#') || line === '') {
            // Empty line ends current block
            if (line === '' && current) {
                blocks.push(current);
                current = null;
            }
            continue;
        }

        // Type header
        const headerMatch = line.match(/^\[(\w+)\]$/);
        if (headerMatch) {
            if (current) blocks.push(current);
            current = { type: headerMatch[1], line: lineNo, props: {} };
            continue;
        }

        const eqIdx = line.indexOf('=');
        if (eqIdx <= 0) {
            throw new SceneFileError(`expected "key = value", got "${line}"`, lineNo);
        }
        if (!current) {
            throw new SceneFileError('property outside of a [Type] block', lineNo);
        }
        const key = line.substring(0, eqIdx).trim();
        current.props[key] = { value: line.substring(eqIdx + 1).trim(), line: lineNo };
    }

    // Final block
    if (current) blocks.push(current);

    return blocks;
}

function num(props: PropMap, key: string, fallback: number): number {
    const prop = props[key];
    if (prop === undefined) return fallback;
    const v = Number(prop.value);
    if (prop.value === '' || !Number.isFinite(v)) {
        throw new SceneFileError(`${key} must be a number, got "${prop.value}"`, prop.line);
    }
    return v;
}

function str(props: PropMap, key: string, fallback: string): string {
    return props[key]?.value ?? fallback;
}

function triple(prop: Prop, key: string): [number, number, number] {
    const parts = prop.value.split(',').map(s => s.trim());
    const values = parts.map(Number);
    if (parts.length !== 3 || parts.some(p => p === '') || values.some(v => !Number.isFinite(v))) {
        throw new SceneFileError(`${key} must be three numbers "x, y, z", got "${prop.value}"`, prop.line);
    }
    return [values[0], values[1], values[2]];
}

function vector(props: PropMap, key: string, fallback: Vector3): Vector3 {
    const prop = props[key];
    if (!prop) return fallback;
    const [x, y, z] = triple(prop, key);
    return new Vector3(x, y, z);
}

function color(props: PropMap, key: string, fallback: Color): Color {
    const prop = props[key];
    if (!prop) return fallback;
    const [r, g, b] = triple(prop, key);
    return new Color(r, g, b);
}

function createMaterial(block: Block): Material {
    const props = block.props;
    const name = props['name']?.value;
    if (!name) {
        throw new SceneFileError(`${block.type} has no name`, block.line);
    }

    switch (block.type) {
        case 'Lambertian':
            return new Lambertian(color(props, 'albedo', new Color(0.5, 0.5, 0.5)), name);
        case 'Metal':
            return new Metal(color(props, 'albedo', new Color(0.8, 0.8, 0.8)), num(props, 'fuzz', 0), name);
        default: {
            const refractionIndex = num(props, 'refractionIndex', 1.5);
            if (!(refractionIndex > 0)) {
                throw new SceneFileError(
                    `refractionIndex must be positive, got "${props['refractionIndex']?.value}"`,
                    props['refractionIndex']?.line ?? block.line
                );
            }
            return new Dielectric(refractionIndex, name);
        }
    }
}

function readCamera(block: Block, camera: Partial<CameraSettings>) {
    for (const key of NUMBER_KEYS) {
        if (block.props[key]) camera[key] = num(block.props, key, 0);
    }
    for (const key of VECTOR_KEYS) {
        if (block.props[key]) camera[key] = vector(block.props, key, new Vector3());
    }
}
