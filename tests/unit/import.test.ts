describe('package entry point', () => {
    beforeEach(() => {
        vi.resetModules();
    });

    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('loads with settings the client does not use being invalid', async () => {
        vi.stubEnv('LOG_LEVEL', 'trace');
        vi.stubEnv('ADE_BASE_URL', 'not a url');

        const ade = await import('../../src/index.js');
        const client = new ade.AdeClient('test-key');

        expect(client.baseUrl).toBe('https://api.va.landing.ai');
        expect(new ade.Logger('ade.test').level).toBe(ade.LogLevel.INFO);
    });

    it('reports invalid settings only when configuration is requested', async () => {
        vi.stubEnv('ADE_API_KEY', 'test-key');
        vi.stubEnv('ADE_BASE_URL', 'not a url');

        const ade = await import('../../src/index.js');

        expect(() => ade.AdeClient.fromConfig()).toThrow(ade.ConfigurationError);
        expect(() => ade.getConfig()).toThrow('Invalid configuration: ade.baseUrl: ADE_BASE_URL must be a valid URL');
    });
});
