import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { FileReadInput, fileReadInputPlugin } from './fileread.input';
import { RecordingChannel } from '../../../test/utils/recording-channel';

describe('FileReadInput', () => {
  let dir: string;
  let channel: RecordingChannel;
  const signal = new AbortController().signal;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fileread-input-'));
    channel = new RecordingChannel();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string | Buffer): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('should deliver each line in file order and end the stream', async () => {
    const file = writeFile('lines.txt', 'alpha\nbeta\r\n\ngamma');
    const input = new FileReadInput({
      path: file,
      mode: 'line',
      chunkSize: 4096,
      skipBlank: false,
    });

    await input.initialize();
    await input.run(channel, signal);
    await input.close();

    expect(channel.texts()).toEqual(['alpha', 'beta', '', 'gamma']);
    expect(channel.units[0].origin).toEqual({ streamId: `file:${file}` });
    expect(channel.ended).toEqual([`file:${file}`]);
  });

  it('should skip blank lines when asked to', async () => {
    const file = writeFile('blank.txt', 'a\n   \n\nb\n');
    const input = new FileReadInput({
      path: file,
      mode: 'line',
      chunkSize: 4096,
      skipBlank: true,
    });

    await input.initialize();
    await input.run(channel, signal);
    await input.close();

    expect(channel.texts()).toEqual(['a', 'b']);
  });

  it('should deliver fixed-size chunks in chunk mode', async () => {
    const file = writeFile('data.bin', Buffer.from('0123456789'));
    const input = new FileReadInput({
      path: file,
      mode: 'chunk',
      chunkSize: 4,
      skipBlank: false,
    });

    await input.initialize();
    await input.run(channel, signal);
    await input.close();

    expect(channel.texts()).toEqual(['0123', '4567', '89']);
  });

  it('should read standard input for path "-"', async () => {
    const input = new FileReadInput(
      { path: '-', mode: 'line', chunkSize: 4096, skipBlank: false },
      Readable.from([Buffer.from('one\ntw'), Buffer.from('o\n')]),
    );

    await input.initialize();
    await input.run(channel, signal);

    expect(channel.texts()).toEqual(['one', 'two']);
    expect(channel.ended).toEqual(['file:-']);
  });

  it('should fail to initialize when the file is missing', async () => {
    const input = new FileReadInput({
      path: path.join(dir, 'absent.txt'),
      mode: 'line',
      chunkSize: 4096,
      skipBlank: false,
    });

    await expect(input.initialize()).rejects.toThrow('ENOENT');
  });

  it('should default to reading stdin line by line', () => {
    expect(fileReadInputPlugin.defaults).toEqual({
      path: '-',
      mode: 'line',
      chunksize: '4096',
      skipblank: 'false',
    });
    expect(
      fileReadInputPlugin.instantiate({
        ...fileReadInputPlugin.defaults,
        chunksize: '0',
      }).ok,
    ).toBe(false);
  });
});
