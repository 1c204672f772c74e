import { Color, Vector3 } from 'three';
import { Scene } from '../physics/Scene';
import { Sphere } from '../physics/components/Sphere';
import { Lambertian } from '../physics/materials/Lambertian';
import { Metal } from '../physics/materials/Metal';
import { Dielectric } from '../physics/materials/Dielectric';
import type { PresetResult } from './types';

/**
 * Three Spheres: one of each material on a large yellow ground sphere.
 *
 * Layout (along -Z, y=0):
 *   Glass sphere with an air bubble (x=-1) | Diffuse blue (x=0) | Fuzzy gold (x=1)
 *
 * The bubble is a second, smaller dielectric with index 1/1.5, so the
 * ratio flips at its surface (air inside glass).
 */
export function createThreeSpheresScene(): PresetResult {
    const scene = new Scene();

    const ground = new Lambertian(new Color(0.8, 0.8, 0.0), "ground");
    const center = new Lambertian(new Color(0.1, 0.2, 0.5), "center");
    const glass = new Dielectric(1.5, "glass");
    const bubble = new Dielectric(1.0 / 1.5, "bubble");
    const gold = new Metal(new Color(0.8, 0.6, 0.2), 1.0, "gold");

    scene.add(new Sphere(new Vector3(0, -100.5, -1), 100, ground, "Ground"));
    scene.add(new Sphere(new Vector3(0, 0, -1.2), 0.5, center, "Center"));
    scene.add(new Sphere(new Vector3(-1, 0, -1), 0.5, glass, "Glass"));
    scene.add(new Sphere(new Vector3(-1, 0, -1), 0.4, bubble, "Bubble"));
    scene.add(new Sphere(new Vector3(1, 0, -1), 0.5, gold, "Gold"));

    return {
        scene,
        camera: {
            aspectRatio: 16 / 9,
            imageWidth: 400,
            samplesPerPixel: 100,
            maxDepth: 50,
            vfov: 20,
            lookFrom: new Vector3(-2, 2, 1),
            lookAt: new Vector3(0, 0, -1),
            vup: new Vector3(0, 1, 0),
            defocusAngle: 10,
            focusDist: 3.4
        }
    };
}
