import { jest } from '@jest/globals';
import {
  FfprobeMetadataProbe,
  toMediaMetrics,
  type CommandRunner,
} from '../../src/services/media/ffprobeService.js';
import { createSilentLogger } from '../utils/testHelpers.js';

/**
 * FFprobe probe tests. ffprobe itself is never run: the command runner is
 * replaced with a mock returning canned JSON.
 */

function ffprobeOutput(format?: Record<string, string>): { stdout: string; stderr: string } {
  return { stdout: JSON.stringify(format ? { format } : {}), stderr: '' };
}

describe('FfprobeMetadataProbe', () => {
  let run: jest.Mock<CommandRunner>;

  beforeEach(() => {
    run = jest.fn<CommandRunner>();
  });

  it('should convert size to whole megabytes and duration to whole seconds', async () => {
    run.mockResolvedValue(ffprobeOutput({ size: '15728640', duration: '125.9' }));
    const probe = new FfprobeMetadataProbe(createSilentLogger(), 'ffprobe', run);

    await expect(probe.probe('/vr/clip.mp4')).resolves.toEqual({ sizeMB: 15, durationSec: 125 });
  });

  it('should pass the file path as a single argument to the configured binary', async () => {
    run.mockResolvedValue(ffprobeOutput({ size: '0', duration: '0' }));
    const probe = new FfprobeMetadataProbe(createSilentLogger(), '/opt/ffmpeg/ffprobe', run);
    const filePath = '/vr/My Clip; rm -rf (1).mp4';

    await probe.probe(filePath);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith('/opt/ffmpeg/ffprobe', [
      '-v',
      'quiet',
      '-print_format',
      'json',
      '-show_format',
      filePath,
    ]);
  });

  it('should return zeros when there is no format section', async () => {
    run.mockResolvedValue(ffprobeOutput());
    const probe = new FfprobeMetadataProbe(createSilentLogger(), 'ffprobe', run);

    await expect(probe.probe('/vr/clip.mp4')).resolves.toEqual({ sizeMB: 0, durationSec: 0 });
  });

  it('should return zeros and warn when ffprobe fails', async () => {
    const logger = createSilentLogger();
    const warn = jest.spyOn(logger, 'warn');
    run.mockRejectedValue(Object.assign(new Error('Invalid data found when processing input'), { code: 1 }));
    const probe = new FfprobeMetadataProbe(logger, 'ffprobe', run);

    await expect(probe.probe('/vr/broken.mp4')).resolves.toEqual({ sizeMB: 0, durationSec: 0 });
    expect(warn).toHaveBeenCalledWith(
      'FFprobe could not read file, treating as empty',
      expect.objectContaining({
        filePath: '/vr/broken.mp4',
        error: 'FFprobe failed: Invalid data found when processing input',
      })
    );
  });

  it('should return zeros when ffprobe prints something that is not JSON', async () => {
    run.mockResolvedValue({ stdout: 'garbage', stderr: '' });
    const probe = new FfprobeMetadataProbe(createSilentLogger(), 'ffprobe', run);

    await expect(probe.probe('/vr/clip.mp4')).resolves.toEqual({ sizeMB: 0, durationSec: 0 });
  });
});

describe('toMediaMetrics', () => {
  it('should return zeros for a missing format section', () => {
    expect(toMediaMetrics(undefined)).toEqual({ sizeMB: 0, durationSec: 0 });
  });

  it('should truncate rather than round', () => {
    expect(toMediaMetrics({ size: '1048575', duration: '59.999' })).toEqual({ sizeMB: 0, durationSec: 59 });
  });

  it('should treat missing and unparseable values as zero', () => {
    expect(toMediaMetrics({ duration: 'N/A' })).toEqual({ sizeMB: 0, durationSec: 0 });
    expect(toMediaMetrics({ size: '-5', duration: '-1' })).toEqual({ sizeMB: 0, durationSec: 0 });
  });
});
