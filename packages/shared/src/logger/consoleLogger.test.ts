import { ConsoleLogger } from './consoleLogger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes info/warn and handles error branches at the default level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger();

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(logger.level).toBe('info');
    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('emits debug messages at the debug level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger({ level: 'debug' }).debug('d');

    expect(debugSpy).toHaveBeenCalledWith('d');
  });

  it('drops everything when silent', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'silent' });
    logger.info('i');
    logger.error(new Error('boom'));

    expect(infoSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('scopes child loggers with prefixes and merges bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');

    logger.child({ a: 1 }).child({ b: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] hello');

    logger.child({ namespace: 'ks1' }).warn('warn');
    expect(warnSpy).toHaveBeenCalledWith('[namespace=ks1] warn');
  });

  it('child loggers respect the parent level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger({ level: 'warn' }).child({ a: 1 }).debug('hidden');

    expect(debugSpy).not.toHaveBeenCalled();
  });
});
