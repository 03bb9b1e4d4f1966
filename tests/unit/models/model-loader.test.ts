import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createModelHandle, loadModel, readModelArtifact } from '../../../src/models/model-loader';
import { FEATURE_NAMES } from '../../../src/utils/feature-vector';
import { constantModel, fixturePath, loadFixtureModel } from '../../helpers/fixtures';

describe('readModelArtifact', () => {
	it('reads compact JSON models', async () => {
		const model = await readModelArtifact(fixturePath('model.json'));
		expect(model.meta.version).toBe('test-model-v1');
		expect(model.trees).toHaveLength(3);
	});

	it('reads LightGBM text models by extension', async () => {
		const model = await readModelArtifact(fixturePath('model.txt'));
		expect(model.meta.version).toBe('lightgbm-v4-3t');
		expect(model.meta.source).toBe(fixturePath('model.txt'));
	});
});

describe('createModelHandle', () => {
	it('freezes the model', () => {
		const handle = createModelHandle(loadFixtureModel(), 'memory');
		expect(Object.isFrozen(handle)).toBe(true);
		expect(Object.isFrozen(handle.model.meta)).toBe(true);
		expect(Object.isFrozen(handle.model.trees[0])).toBe(true);
		expect(handle.version).toBe('test-model-v1');
		expect(handle.source).toBe('memory');
	});

	it('lets the caller override the version', () => {
		expect(createModelHandle(loadFixtureModel(), 'memory', 'pinned').version).toBe('pinned');
	});

	it('rejects models that read unknown features', () => {
		const model = constantModel(0);
		model.meta.features = [...FEATURE_NAMES, 'entropy'];
		expect(() => createModelHandle(model, 'memory')).toThrow('Model expects unknown features: entropy');
	});

	it('accepts models that ignore some features', () => {
		const model = constantModel(0);
		model.meta.features = ['url_length'];
		expect(createModelHandle(model, 'memory').version).toBe('constant');
	});
});

describe('loadModel', () => {
	let dir: string;

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), 'url-model-'));
		await writeFile(join(dir, 'broken.json'), '{"meta": ');
		await writeFile(join(dir, 'wrong-shape.json'), JSON.stringify({ meta: { version: 'x' }, trees: [] }));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('uses the first candidate that exists', async () => {
		const handle = await loadModel({
			paths: [join(dir, 'absent.txt'), fixturePath('model.txt'), fixturePath('model.json')],
		});
		expect(handle?.version).toBe('lightgbm-v4-3t');
		expect(handle?.source).toBe(fixturePath('model.txt'));
	});

	it('applies the configured version', async () => {
		const handle = await loadModel({ paths: [fixturePath('model.json')], version: '2.0.0' });
		expect(handle?.version).toBe('2.0.0');
	});

	it('returns null when no candidate exists', async () => {
		expect(await loadModel({ paths: [join(dir, 'absent.json')] })).toBeNull();
	});

	it('returns null for unparsable artifacts', async () => {
		expect(await loadModel({ paths: [join(dir, 'broken.json')] })).toBeNull();
	});

	it('stops at the first existing candidate even when it is invalid', async () => {
		expect(await loadModel({ paths: [join(dir, 'wrong-shape.json'), fixturePath('model.json')] })).toBeNull();
	});
});
