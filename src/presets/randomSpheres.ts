import { Color, Vector3 } from 'three';
import { Scene } from '../physics/Scene';
import { Sphere } from '../physics/components/Sphere';
import { Material } from '../physics/Material';
import { Lambertian } from '../physics/materials/Lambertian';
import { Metal } from '../physics/materials/Metal';
import { Dielectric } from '../physics/materials/Dielectric';
import { mulberry32 } from '../physics/random';
import type { PresetResult } from './types';

/**
 * Random Spheres: a 22×22 grid of small jittered spheres on a grey ground
 * plane, plus three large feature spheres (glass, brown diffuse, polished
 * metal) along the X axis.
 *
 * Small sphere materials: 80% diffuse, 15% metal, 5% glass. The layout is
 * seeded so the same seed always builds the same scene.
 */
export function createRandomSpheresScene(seed: number = 42): PresetResult {
    const rand = mulberry32(seed);
    const between = (min: number, max: number) => min + (max - min) * rand();
    const scene = new Scene();

    const ground = new Lambertian(new Color(0.5, 0.5, 0.5), "ground");
    scene.add(new Sphere(new Vector3(0, -1000, 0), 1000, ground, "Ground"));

    // Keep the small spheres clear of the metal feature sphere
    const clearance = new Vector3(4, 0.2, 0);

    for (let a = -11; a < 11; a++) {
        for (let b = -11; b < 11; b++) {
            const chooseMat = rand();
            const center = new Vector3(a + 0.9 * rand(), 0.2, b + 0.9 * rand());
            if (center.distanceTo(clearance) <= 0.9) continue;

            let material: Material;
            if (chooseMat < 0.8) {
                const albedo = new Color(rand() * rand(), rand() * rand(), rand() * rand());
                material = new Lambertian(albedo, `diffuse_${a}_${b}`);
            } else if (chooseMat < 0.95) {
                const albedo = new Color(between(0.5, 1), between(0.5, 1), between(0.5, 1));
                material = new Metal(albedo, between(0, 0.5), `metal_${a}_${b}`);
            } else {
                material = new Dielectric(1.5, `glass_${a}_${b}`);
            }
            scene.add(new Sphere(center, 0.2, material, `Sphere ${a},${b}`));
        }
    }

    scene.add(new Sphere(new Vector3(0, 1, 0), 1.0, new Dielectric(1.5, "glass"), "Glass"));
    scene.add(new Sphere(new Vector3(-4, 1, 0), 1.0, new Lambertian(new Color(0.4, 0.2, 0.1), "brown"), "Diffuse"));
    scene.add(new Sphere(new Vector3(4, 1, 0), 1.0, new Metal(new Color(0.7, 0.6, 0.5), 0.0, "steel"), "Metal"));

    return {
        scene,
        camera: {
            aspectRatio: 16 / 9,
            imageWidth: 400,
            samplesPerPixel: 50,
            maxDepth: 50,
            vfov: 20,
            lookFrom: new Vector3(13, 2, 3),
            lookAt: new Vector3(0, 0, 0),
            vup: new Vector3(0, 1, 0),
            defocusAngle: 0.6,
            focusDist: 10
        }
    };
}
