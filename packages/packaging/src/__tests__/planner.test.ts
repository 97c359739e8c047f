import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import * as tar from 'tar';
import { pino } from 'pino';
import {
  parsePackagingConfig,
  SourceNotFoundError,
  type PackageDescriptor,
  type PackagingConfigInput,
} from '@cruise-packager/core';
import { TarArchiver, type Archiver, type ArchiveRequest } from '../archiver.js';
import { FileChecksumComputer, type ChecksumComputer } from '../checksum.js';
import { parseManifest } from '../manifest.js';
import { PackagePlanner, type ArchiveProgressEvent, type ArchiveStartEvent } from '../planner.js';

const silent = pino({ level: 'silent' });

function writeDataset(root: string, name: string, bytes: number): void {
  const dir = path.join(root, name);
  fs.mkdirSync(dir, { recursive: true });
  if (bytes > 0) {
    fs.writeFileSync(path.join(dir, `${name}.dat`), Buffer.alloc(bytes, 1));
  }
}

async function listTarFiles(tarPath: string): Promise<string[]> {
  const files: string[] = [];
  await tar.list({
    file: tarPath,
    onReadEntry: (entry) => {
      if (entry.type === 'File') {
        files.push(entry.path);
      }
    },
  });
  return files.sort();
}

describe('PackagePlanner', () => {
  let tempDir: string;
  let sourceDir: string;
  let outputRoot: string;

  const createPlanner = (
    input: Omit<PackagingConfigInput, 'outputRoot'>,
    deps: { archiver?: Archiver; checksum?: ChecksumComputer } = {}
  ) =>
    new PackagePlanner(parsePackagingConfig({ outputRoot, ...input }), {
      logger: silent,
      archiver: deps.archiver ?? new TarArchiver({ logger: silent }),
      checksum: deps.checksum,
    });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'planner-test-'));
    sourceDir = path.join(tempDir, 'CruiseData', 'SKQ2024');
    outputRoot = path.join(tempDir, 'r2r_packages');
    fs.mkdirSync(sourceDir, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('packages general data first, then large datasets smallest to largest', async () => {
    writeDataset(sourceDir, 'nav', 10 * 1024);
    writeDataset(sourceDir, 'em304', 50 * 1024);
    writeDataset(sourceDir, 'ek80', 5 * 1024);

    const run = await createPlanner({ largeDatasets: ['em304', 'ek80'] }).run('SKQ2024', sourceDir);

    expect(run.packages.map((info) => [info.name, info.sourceSize])).toEqual([
      ['SKQ2024_general.tar.gz', 10 * 1024],
      ['SKQ2024_ek80.tar.gz', 5 * 1024],
      ['SKQ2024_em304.tar.gz', 50 * 1024],
    ]);
    expect(run.failures).toEqual([]);
    expect(run.outputDir).toBe(path.join(outputRoot, 'SKQ2024'));

    const manifest = parseManifest(fs.readFileSync(run.manifestPath, 'utf8'));
    expect(manifest.map((entry) => entry.name)).toEqual([
      'SKQ2024_general.tar.gz',
      'SKQ2024_ek80.tar.gz',
      'SKQ2024_em304.tar.gz',
    ]);
    for (const entry of manifest) {
      expect(fs.existsSync(path.join(run.outputDir, entry.name))).toBe(true);
    }
    expect(manifest.map((entry) => entry.digest)).toEqual(run.packages.map((info) => info.digest));
  });

  it('records digests that match the written archives', async () => {
    writeDataset(sourceDir, 'nav', 300);

    const run = await createPlanner({ largeDatasets: [] }).run('C1', sourceDir);
    const [general] = run.packages;

    expect(general).toBeDefined();
    expect(general?.digest).toBe(await new FileChecksumComputer('md5').compute(path.join(run.outputDir, 'C1_general.tar.gz')));
    expect(general?.compressedSize).toBe(fs.statSync(path.join(run.outputDir, 'C1_general.tar.gz')).size);
  });

  it('orders large datasets by ascending size regardless of listing order', async () => {
    writeDataset(sourceDir, 'a', 5000);
    writeDataset(sourceDir, 'b', 1000);
    writeDataset(sourceDir, 'c', 3000);
    const planner = createPlanner({ largeDatasets: ['a', 'b', 'c'] });
    const started: string[] = [];
    planner.on('archive:start', (event: ArchiveStartEvent) => started.push(event.name));

    const run = await planner.run('C1', sourceDir);

    expect(started).toEqual(['C1_b.tar.gz', 'C1_c.tar.gz', 'C1_a.tar.gz']);
    expect(run.packages.map((info) => info.sourceSize)).toEqual([1000, 3000, 5000]);
  });

  it('bundles every ordinary directory into the general archive, leaving out the reserved one', async () => {
    writeDataset(sourceDir, 'nav', 10);
    writeDataset(sourceDir, 'met', 20);
    writeDataset(sourceDir, 'r2r', 30);
    writeDataset(sourceDir, 'ek80', 40);

    const run = await createPlanner({ largeDatasets: ['ek80'] }).run('C1', sourceDir);

    expect(await listTarFiles(path.join(run.outputDir, 'C1_general.tar.gz'))).toEqual([
      'met/met.dat',
      'nav/nav.dat',
    ]);
    expect(run.packages[0]?.sourceSize).toBe(30);
  });

  it('skips the general archive when only large datasets exist', async () => {
    writeDataset(sourceDir, 'em304', 100);

    const run = await createPlanner({ largeDatasets: ['em304'] }).run('C1', sourceDir);

    expect(run.packages.map((info) => info.name)).toEqual(['C1_em304.tar.gz']);
    expect(fs.existsSync(path.join(run.outputDir, 'C1_general.tar.gz'))).toBe(false);
  });

  it('skips per-dataset archives and reports allow-listed names that are absent', async () => {
    writeDataset(sourceDir, 'nav', 100);

    const run = await createPlanner({ largeDatasets: ['em304', 'radar'] }).run('C1', sourceDir);

    expect(run.packages.map((info) => info.name)).toEqual(['C1_general.tar.gz']);
    expect(run.missingDatasets).toEqual(['em304', 'radar']);
    expect(fs.readdirSync(run.outputDir).filter((name) => name.endsWith('.tar.gz'))).toEqual([
      'C1_general.tar.gz',
    ]);
  });

  it('archives an empty dataset and reports a 0.0% ratio', async () => {
    writeDataset(sourceDir, 'radar', 0);

    const run = await createPlanner({ largeDatasets: ['radar'] }).run('C1', sourceDir);

    expect(run.packages).toHaveLength(1);
    expect(run.packages[0]?.sourceSize).toBe(0);
    expect(run.report.split('\n')).toContain(
      `${'C1_radar.tar.gz'.padEnd(40)} ${'0.00 B'.padEnd(15)} ` +
        `${`${(run.packages[0]?.compressedSize ?? 0).toFixed(2)} B`.padEnd(15)} 0.0%`
    );
  });

  it('copies root files verbatim and writes the summary file', async () => {
    fs.writeFileSync(path.join(sourceDir, 'cruise_report.txt'), 'Sikuliaq cruise notes');
    writeDataset(sourceDir, 'nav', 10);

    const run = await createPlanner({ largeDatasets: [] }).run('C1', sourceDir);

    expect(run.copiedFiles).toEqual(['cruise_report.txt']);
    expect(fs.readFileSync(path.join(run.outputDir, 'cruise_report.txt'), 'utf8')).toBe('Sikuliaq cruise notes');
    expect(run.summaryPath).toBe(path.join(run.outputDir, 'C1_r2r_summary.txt'));
    expect(fs.readFileSync(run.summaryPath, 'utf8')).toBe(run.report);
  });

  it('keeps @-prefixed directories in the general archive and as large datasets', async () => {
    writeDataset(sourceDir, 'nav', 10);
    writeDataset(sourceDir, '@raw', 20);
    writeDataset(sourceDir, '@sonar', 30);

    const run = await createPlanner({ largeDatasets: ['@sonar'] }).run('C1', sourceDir);

    expect(run.failures).toEqual([]);
    expect(run.packages.map((info) => [info.name, info.sourceSize])).toEqual([
      ['C1_general.tar.gz', 30],
      ['C1_@sonar.tar.gz', 30],
    ]);
    expect(await listTarFiles(path.join(run.outputDir, 'C1_general.tar.gz'))).toEqual([
      '@raw/@raw.dat',
      'nav/nav.dat',
    ]);
    expect(await listTarFiles(path.join(run.outputDir, 'C1_@sonar.tar.gz'))).toEqual(['@sonar/@sonar.dat']);
  });

  it('records a root file that cannot be copied and carries on', async () => {
    fs.writeFileSync(path.join(sourceDir, 'cruise_notes.txt'), 'notes');
    fs.writeFileSync(path.join(sourceDir, 'cruise_report.txt'), 'report');
    writeDataset(sourceDir, 'nav', 10);
    writeDataset(sourceDir, 'ek80', 20);
    // A directory in the way makes the copy fail even for root
    fs.mkdirSync(path.join(outputRoot, 'C1', 'cruise_notes.txt'), { recursive: true });

    const planner = createPlanner({ largeDatasets: ['ek80'] });
    const failedEvents: Array<{ name: string; message: string }> = [];
    planner.on('file:failed', (event: { name: string; message: string }) => failedEvents.push(event));

    const run = await planner.run('C1', sourceDir);

    expect(run.copiedFiles).toEqual(['cruise_report.txt']);
    expect(fs.readFileSync(path.join(run.outputDir, 'cruise_report.txt'), 'utf8')).toBe('report');
    expect(run.failures).toHaveLength(1);
    expect(run.failures[0]?.kind).toBe('copy');
    expect(run.failures[0]?.target).toBe('cruise_notes.txt');
    expect(run.failures[0]?.message).toContain(`Error copying ${path.join(sourceDir, 'cruise_notes.txt')}: EISDIR`);
    expect(failedEvents.map((event) => event.name)).toEqual(['cruise_notes.txt']);

    expect(run.packages.map((info) => info.name)).toEqual(['C1_general.tar.gz', 'C1_ek80.tar.gz']);
    expect(parseManifest(fs.readFileSync(run.manifestPath, 'utf8')).map((entry) => entry.name)).toEqual([
      'C1_general.tar.gz',
      'C1_ek80.tar.gz',
    ]);
  });

  it('classifies directories into general and large datasets', () => {
    const plan = createPlanner({ largeDatasets: ['em304', 'ek80', 'radar'] }).classify(
      ['ek80', 'met', 'nav', 'r2r'],
      sourceDir
    );

    expect(plan).toEqual({
      general: [
        { name: 'met', path: path.join(sourceDir, 'met') },
        { name: 'nav', path: path.join(sourceDir, 'nav') },
      ],
      large: [{ name: 'ek80', path: path.join(sourceDir, 'ek80') }],
      missing: ['em304', 'radar'],
    });
  });

  it('continues past a failed archive and leaves it out of the manifest and report', async () => {
    writeDataset(sourceDir, 'nav', 10);
    writeDataset(sourceDir, 'ek80', 1000);
    writeDataset(sourceDir, 'radar', 2000);
    writeDataset(sourceDir, 'em304', 3000);

    const tarArchiver = new TarArchiver({ logger: silent });
    const flaky: Archiver = {
      create: async (request: ArchiveRequest) => {
        if (request.destination.endsWith('_radar.tar.gz')) {
          fs.writeFileSync(request.destination, 'partial');
          throw new Error('disk full');
        }
        return tarArchiver.create(request);
      },
    };

    const run = await createPlanner({ largeDatasets: ['em304', 'ek80', 'radar'] }, { archiver: flaky }).run(
      'C1',
      sourceDir
    );

    expect(run.packages.map((info) => info.name)).toEqual([
      'C1_general.tar.gz',
      'C1_ek80.tar.gz',
      'C1_em304.tar.gz',
    ]);
    expect(run.failures).toEqual([
      {
        kind: 'archive',
        target: 'C1_radar.tar.gz',
        message: `Error creating ${path.join(run.outputDir, 'C1_radar.tar.gz')}: disk full`,
      },
    ]);

    const manifestNames = parseManifest(fs.readFileSync(run.manifestPath, 'utf8')).map((entry) => entry.name);
    expect(manifestNames).not.toContain('C1_radar.tar.gz');
    expect(manifestNames).toHaveLength(3);

    const summary = fs.readFileSync(run.summaryPath, 'utf8');
    expect(summary).toBe(run.report);
    expect(summary).not.toContain('C1_radar.tar.gz');
    // The partial file stays for inspection
    expect(fs.readFileSync(path.join(run.outputDir, 'C1_radar.tar.gz'), 'utf8')).toBe('partial');
  });

  it('leaves out an archive whose checksum fails', async () => {
    writeDataset(sourceDir, 'nav', 10);
    writeDataset(sourceDir, 'ek80', 10);
    const md5 = new FileChecksumComputer('md5');
    const failing: ChecksumComputer = {
      algorithm: 'md5',
      compute: async (filePath: string) => {
        if (filePath.endsWith('_ek80.tar.gz')) {
          throw new Error('read error');
        }
        return md5.compute(filePath);
      },
    };

    const run = await createPlanner({ largeDatasets: ['ek80'] }, { checksum: failing }).run('C1', sourceDir);

    expect(run.packages.map((info) => info.name)).toEqual(['C1_general.tar.gz']);
    expect(run.failures.map((failure) => [failure.kind, failure.target])).toEqual([['checksum', 'C1_ek80.tar.gz']]);
  });

  it('emits progress only when enabled', async () => {
    writeDataset(sourceDir, 'nav', 10);
    fs.writeFileSync(path.join(sourceDir, 'nav', 'second.dat'), 'x');

    const quiet = createPlanner({ largeDatasets: [] });
    const quietEvents: ArchiveProgressEvent[] = [];
    quiet.on('archive:progress', (event: ArchiveProgressEvent) => quietEvents.push(event));
    await quiet.run('C1', sourceDir);

    const loud = createPlanner({ largeDatasets: [], showProgress: true });
    const loudEvents: ArchiveProgressEvent[] = [];
    loud.on('archive:progress', (event: ArchiveProgressEvent) => loudEvents.push(event));
    await loud.run('C2', sourceDir);

    expect(quietEvents).toEqual([]);
    expect(loudEvents).toEqual([
      { name: 'C2_general.tar.gz', count: 1, total: 2 },
      { name: 'C2_general.tar.gz', count: 2, total: 2 },
    ]);
  });

  it('overwrites the outputs of a previous run', async () => {
    writeDataset(sourceDir, 'nav', 10);
    const planner = createPlanner({ largeDatasets: [] });

    const first = await planner.run('C1', sourceDir);
    fs.writeFileSync(path.join(sourceDir, 'nav', 'late.dat'), 'added later');
    const second = await planner.run('C1', sourceDir);

    const onlyGeneral = (packages: PackageDescriptor[]) => packages.map((info) => info.name);
    expect(onlyGeneral(second.packages)).toEqual(onlyGeneral(first.packages));
    expect(second.packages[0]?.sourceSize).toBe(21);
    expect(await listTarFiles(path.join(second.outputDir, 'C1_general.tar.gz'))).toEqual([
      'nav/late.dat',
      'nav/nav.dat',
    ]);
  });

  it('throws SourceNotFoundError when the source directory is missing', async () => {
    await expect(
      createPlanner({ largeDatasets: [] }).run('C1', path.join(tempDir, 'absent'))
    ).rejects.toBeInstanceOf(SourceNotFoundError);
  });
});
