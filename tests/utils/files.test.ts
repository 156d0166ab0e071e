import { expect } from 'chai';
import fs from 'fs/promises';
import nock from 'nock';
import os from 'os';
import path from 'path';
import sinon from 'sinon';
import logger from '../../src/logger';
import {
  ArtifactNotFoundError,
  ensureArtifact,
  ensureModelArtifacts,
  fileExists,
  validateUrl,
} from '../../src/utils/files';
import { setupTestEnvironment, teardownTestEnvironment } from '../helpers/setup';

const ARTIFACT_HOST = 'http://artifacts.test';

const modelJson = {
  format: 'layers-model',
  modelTopology: { class_name: 'Model', config: {} },
  weightsManifest: [
    { paths: ['group1-shard1of2.bin', 'group1-shard2of2.bin'], weights: [] },
  ],
};

describe('artifact files', () => {
  let directory: string;

  before(() => {
    setupTestEnvironment();
  });

  after(() => {
    teardownTestEnvironment();
  });

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
    sinon.stub(logger, 'info');
    sinon.stub(logger, 'debug');
    sinon.stub(logger, 'error');
  });

  afterEach(async () => {
    sinon.restore();
    nock.cleanAll();
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('validateUrl should accept only http and https URLs', () => {
    expect(validateUrl('https://artifacts.test/model.json')).to.be.true;
    expect(validateUrl('http://artifacts.test/model.json')).to.be.true;
    expect(validateUrl('file:///models/model.json')).to.be.false;
    expect(validateUrl('not a url')).to.be.false;
  });

  it('fileExists should only report regular files', async () => {
    const file = path.join(directory, 'present.txt');
    await fs.writeFile(file, 'x');

    expect(await fileExists(file)).to.be.true;
    expect(await fileExists(directory)).to.be.false;
    expect(await fileExists(path.join(directory, 'missing.txt'))).to.be.false;
  });

  describe('ensureArtifact', () => {
    it('should use a local file without downloading', async () => {
      const file = path.join(directory, 'centroids.json');
      await fs.writeFile(file, '{}');
      const scope = nock(ARTIFACT_HOST).get('/centroids.json').reply(200, '{"remote":true}');

      const resolved = await ensureArtifact(file, `${ARTIFACT_HOST}/centroids.json`);

      expect(resolved).to.equal(file);
      expect(await fs.readFile(file, 'utf8')).to.equal('{}');
      expect(scope.isDone()).to.be.false;
    });

    it('should download a missing file into nested directories', async () => {
      const file = path.join(directory, 'nested', 'centroids.json');
      const scope = nock(ARTIFACT_HOST).get('/centroids.json').reply(200, '{"remote":true}');

      await ensureArtifact(file, `${ARTIFACT_HOST}/centroids.json`);

      expect(scope.isDone()).to.be.true;
      expect(await fs.readFile(file, 'utf8')).to.equal('{"remote":true}');
    });

    it('should fail when the file is missing and no URL is configured', async () => {
      const file = path.join(directory, 'centroids.json');

      try {
        await ensureArtifact(file);
        expect.fail('ensureArtifact should have thrown');
      } catch (err) {
        expect(err).to.be.instanceOf(ArtifactNotFoundError);
        expect(err).to.have.property(
          'message',
          `Artifact not found at ${file} and no download URL is configured`
        );
      }
    });

    it('should surface download failures', async () => {
      const file = path.join(directory, 'centroids.json');
      nock(ARTIFACT_HOST).get('/centroids.json').reply(404);

      try {
        await ensureArtifact(file, `${ARTIFACT_HOST}/centroids.json`);
        expect.fail('ensureArtifact should have thrown');
      } catch (err) {
        expect(err).to.have.property('message', 'Request failed with status code 404');
      }
      expect(await fileExists(file)).to.be.false;
    });
  });

  describe('ensureModelArtifacts', () => {
    it('should download model.json and every shard relative to the model URL', async () => {
      const modelPath = path.join(directory, 'soil', 'model.json');
      const scope = nock(ARTIFACT_HOST)
        .get('/models/soil/model.json')
        .reply(200, modelJson)
        .get('/models/soil/group1-shard1of2.bin')
        .reply(200, Buffer.from([1, 2, 3]))
        .get('/models/soil/group1-shard2of2.bin')
        .reply(200, Buffer.from([4, 5]));

      const resolved = await ensureModelArtifacts(modelPath, `${ARTIFACT_HOST}/models/soil/model.json`);

      expect(resolved).to.equal(modelPath);
      expect(scope.isDone()).to.be.true;
      expect([...(await fs.readFile(path.join(directory, 'soil', 'group1-shard1of2.bin')))]).to.deep.equal([
        1, 2, 3,
      ]);
      expect([...(await fs.readFile(path.join(directory, 'soil', 'group1-shard2of2.bin')))]).to.deep.equal([
        4, 5,
      ]);
    });

    it('should only fetch shards that are missing locally', async () => {
      const soilDirectory = path.join(directory, 'soil');
      await fs.mkdir(soilDirectory);
      await fs.writeFile(path.join(soilDirectory, 'model.json'), JSON.stringify(modelJson));
      await fs.writeFile(path.join(soilDirectory, 'group1-shard1of2.bin'), Buffer.from([9]));
      const scope = nock(ARTIFACT_HOST)
        .get('/models/soil/group1-shard2of2.bin')
        .reply(200, Buffer.from([4, 5]));

      await ensureModelArtifacts(
        path.join(soilDirectory, 'model.json'),
        `${ARTIFACT_HOST}/models/soil/model.json`
      );

      expect(scope.isDone()).to.be.true;
      expect([...(await fs.readFile(path.join(soilDirectory, 'group1-shard1of2.bin')))]).to.deep.equal([9]);
    });

    it('should fail on a missing shard when no URL is configured', async () => {
      const soilDirectory = path.join(directory, 'soil');
      await fs.mkdir(soilDirectory);
      await fs.writeFile(path.join(soilDirectory, 'model.json'), JSON.stringify(modelJson));

      try {
        await ensureModelArtifacts(path.join(soilDirectory, 'model.json'));
        expect.fail('ensureModelArtifacts should have thrown');
      } catch (err) {
        expect(err).to.be.instanceOf(ArtifactNotFoundError);
      }
    });
  });
});
