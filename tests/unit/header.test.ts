import { describe, expect, test } from 'vitest';

import { createSlurmHeader, type SlurmHeaderInput } from '../../src/core/configSchema.js';
import {
  directiveName,
  formatWallTime,
  headerDirectives,
  inJobDirectory,
  renderHeader
} from '../../src/core/header.js';

const baseHeader: SlurmHeaderInput = {
  account: 'test-account',
  job_name: 'demo',
  nodes: 4,
  ntasks_per_node: 32,
  time: [2, 0, 30],
  job_directory: 'results'
};

describe('renderHeader', () => {
  test('renders the mandatory block with defaults', () => {
    const header = renderHeader(createSlurmHeader(baseHeader));

    expect(header).toBe(
      [
        '#!/bin/bash',
        '#',
        '#SBATCH --account=test-account',
        '#SBATCH --partition=standard',
        '#SBATCH --qos=standard',
        '#',
        '#SBATCH --job-name=demo',
        '#SBATCH --output=results/slurm-%x-%j.out',
        '#SBATCH --error=results/slurm-%x-%j.out',
        '#',
        '#SBATCH --nodes=4',
        '#SBATCH --ntasks-per-node=32',
        '#',
        '#SBATCH --time=02:00:30',
        ''
      ].join('\n')
    );
  });

  test('recovers the mandatory values from the rendered directives', () => {
    const header = renderHeader(
      createSlurmHeader({ ...baseHeader, partition: 'highmem', qos: 'short', time: [0, 7, 5] })
    );
    const values = Object.fromEntries(
      header
        .split('\n')
        .filter((line) => line.startsWith('#SBATCH --'))
        .map((line) => {
          const [name, value] = line.slice('#SBATCH --'.length).split('=');
          return [name, value];
        })
    );

    expect(values).toMatchObject({
      account: 'test-account',
      partition: 'highmem',
      qos: 'short',
      'job-name': 'demo',
      nodes: '4',
      'ntasks-per-node': '32',
      time: '00:07:05'
    });
  });

  test('includes optional directives only when they differ from the default', () => {
    const plain = renderHeader(createSlurmHeader(baseHeader));
    expect(plain).not.toContain('--distribution');

    const header = renderHeader(
      createSlurmHeader({ ...baseHeader, distribution: 'block:block', switches: 1 })
    );
    expect(header.endsWith('#\n#SBATCH --switches=1\n#\n#SBATCH --distribution=block:block\n')).toBe(
      true
    );
  });

  test('renders set flags as bare directives after the optionals', () => {
    const header = renderHeader(
      createSlurmHeader({
        ...baseHeader,
        mail_user: 'someone@example.org',
        mail_type: 'END',
        exclusive: true
      })
    );

    expect(header.split('\n').slice(-7)).toEqual([
      '#',
      '#SBATCH --mail-user=someone@example.org',
      '#',
      '#SBATCH --mail-type=END',
      '#',
      '#SBATCH --exclusive',
      ''
    ]);
    expect(header).not.toContain('--requeue');
  });

  test('uses the configured interpreter line verbatim', () => {
    const header = renderHeader(createSlurmHeader({ ...baseHeader, bash_path: '!/usr/bin/env bash' }));
    expect(header.startsWith('#!/usr/bin/env bash\n#\n')).toBe(true);
  });

  test('strips a trailing slash from the job directory', () => {
    const withSlash = renderHeader(createSlurmHeader({ ...baseHeader, job_directory: 'results/' }));
    const withoutSlash = renderHeader(createSlurmHeader(baseHeader));
    expect(withSlash).toBe(withoutSlash);
  });
});

describe('header helpers', () => {
  test('maps field names to directive names', () => {
    expect(directiveName('mail_user')).toBe('mail-user');
    expect(directiveName('ntasks_per_node')).toBe('ntasks-per-node');
  });

  test('pads wall time fields to two digits', () => {
    expect(formatWallTime([0, 5, 0])).toBe('00:05:00');
    expect(formatWallTime([120, 0, 9])).toBe('120:00:09');
  });

  test('lists optional directives before flags', () => {
    const directives = headerDirectives(
      createSlurmHeader({ ...baseHeader, requeue: true, hint: 'nomultithread' })
    );
    expect(directives).toEqual(['--hint=nomultithread', '--requeue']);
  });

  test('leaves names bare when there is no job directory', () => {
    expect(inJobDirectory('', 'slurm.out')).toBe('slurm.out');
    expect(inJobDirectory('runs/', 'slurm.out')).toBe('runs/slurm.out');
  });

  test('keeps the filesystem root as a prefix', () => {
    expect(inJobDirectory('/', 'slurm.out')).toBe('/slurm.out');
  });
});
