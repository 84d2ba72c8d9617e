// Components log through console with [tag] prefixes; keep test output quiet.
let consoleSpies: jest.SpyInstance[] = [];

beforeEach(() => {
    consoleSpies = [
        jest.spyOn(console, 'log').mockImplementation(() => undefined),
        jest.spyOn(console, 'warn').mockImplementation(() => undefined),
        jest.spyOn(console, 'error').mockImplementation(() => undefined),
    ];
});

afterEach(() => {
    for (const spy of consoleSpies) spy.mockRestore();
});
