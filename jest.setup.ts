import nock from 'nock';

// Tests never reach the real catalog, analytics or token endpoints.
beforeAll(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
});

afterAll(() => {
  nock.enableNetConnect();
});
