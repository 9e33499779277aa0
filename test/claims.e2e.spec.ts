import 'reflect-metadata';
import { INestApplication, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { hashCustomerId } from '../src/claims/domain/customer-hash';
import { Clock } from '../src/claims/ports/clock';

const OWNER = 'registry-owner';
const USER = 'user-1';

describe('Claim registry (e2e)', () => {
  let app: INestApplication;
  const clock: Clock = { now: () => 1700000000 };

  beforeEach(async () => {
    process.env.REGISTRY_OWNER = OWNER;
    process.env.STORAGE_DRIVER = 'memory';

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider('Clock')
      .useValue(clock)
      .compile();

    app = moduleRef.createNestApplication();
    Logger.overrideLogger(false);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    delete process.env.REGISTRY_OWNER;
    delete process.env.STORAGE_DRIVER;
  });

  const submit = (customerId: string, amount: string) =>
    request(app.getHttpServer()).post('/claims').set('x-caller-id', USER).send({ customerId, amount });

  it('runs a claim from submission to approval', async () => {
    await submit('USER123', '1000000000000000000').expect(201, { claimId: 1 });

    await request(app.getHttpServer())
      .get('/claims/1')
      .expect(200, {
        claimId: 1,
        customerIdHash: hashCustomerId('USER123'),
        amount: '1000000000000000000',
        claimDate: 1700000000,
        status: 'Submitted'
      });

    await request(app.getHttpServer())
      .patch('/claims/1/status')
      .set('x-caller-id', OWNER)
      .send({ status: 'Approved' })
      .expect(200, { claimId: 1, oldStatus: 'Submitted', newStatus: 'Approved' });

    const again = await request(app.getHttpServer())
      .patch('/claims/1/status')
      .set('x-caller-id', OWNER)
      .send({ status: 'Approved' })
      .expect(409);
    expect(again.body.error).toBe('StatusAlreadySet');

    const missing = await request(app.getHttpServer()).get('/claims/999').expect(404);
    expect(missing.body).toEqual({ statusCode: 404, message: 'Claim 999 not found', error: 'ClaimNotFound' });
  });

  it('rejects zero amounts and malformed bodies', async () => {
    const zero = await submit('USER123', '0').expect(400);
    expect(zero.body.error).toBe('InvalidAmount');

    await submit('USER123', '-5').expect(400);
    await submit('USER123', '1.5').expect(400);
    await request(app.getHttpServer()).get('/claims/1').expect(404);
  });

  it('requires a caller identity for mutations', async () => {
    const res = await request(app.getHttpServer()).post('/claims').send({ customerId: 'USER123', amount: '1' }).expect(401);
    expect(res.body.error).toBe('MissingCaller');
  });

  it('keeps status changes to the owner', async () => {
    await submit('USER123', '10').expect(201);

    const res = await request(app.getHttpServer())
      .patch('/claims/1/status')
      .set('x-caller-id', USER)
      .send({ status: 'Rejected' })
      .expect(403);
    expect(res.body.error).toBe('Unauthorized');

    const invalid = await request(app.getHttpServer())
      .patch('/claims/1/status')
      .set('x-caller-id', OWNER)
      .send({ status: 'Closed' })
      .expect(400);
    expect(invalid.body.error).toBe('InvalidStatus');

    await request(app.getHttpServer()).get('/claims/1').expect(200).expect((r) => {
      expect(r.body.status).toBe('Submitted');
    });
  });

  it('verifies ownership and serializes claims as text', async () => {
    await submit('alice', '100').expect(201);
    await submit('bob', '200').expect(201);
    await submit('alice', '300').expect(201);

    await request(app.getHttpServer())
      .post('/claims/3/verify-ownership')
      .send({ customerId: 'alice' })
      .expect(200, { claimId: 3, owned: true });
    await request(app.getHttpServer())
      .post('/claims/3/verify-ownership')
      .send({ customerId: 'bob' })
      .expect(200, { claimId: 3, owned: false });

    const text = await request(app.getHttpServer()).get('/claims/2/text').expect(200);
    expect(text.text).toBe(
      `{"claimId":"2","customerIdHash":"${hashCustomerId('bob')}","amount":"200","claimDate":"1700000000","status":"Submitted"}`
    );

    const list = await request(app.getHttpServer()).post('/claims/by-customer').send({ customerId: 'alice' }).expect(200);
    expect(JSON.parse(list.text).map((c: { claimId: string }) => c.claimId)).toEqual(['1', '3']);

    const none = await request(app.getHttpServer()).post('/claims/by-customer').send({ customerId: 'carol' }).expect(200);
    expect(none.text).toBe('[]');
  });

  it('transfers and renounces ownership', async () => {
    await request(app.getHttpServer()).get('/registry/owner').expect(200, { owner: OWNER });

    await request(app.getHttpServer())
      .post('/registry/owner/transfer')
      .set('x-caller-id', USER)
      .send({ newOwner: USER })
      .expect(403);

    const padded = await request(app.getHttpServer())
      .post('/registry/owner/transfer')
      .set('x-caller-id', OWNER)
      .send({ newOwner: ' owner-2 ' })
      .expect(400);
    expect(padded.body.error).toBe('InvalidOwner');

    await request(app.getHttpServer())
      .post('/registry/owner/transfer')
      .set('x-caller-id', OWNER)
      .send({ newOwner: 'owner-2' })
      .expect(200, { owner: 'owner-2' });

    await request(app.getHttpServer())
      .post('/registry/owner/renounce')
      .set('x-caller-id', 'owner-2')
      .expect(200, { owner: null });

    await request(app.getHttpServer()).get('/registry/owner').expect(200, { owner: null });
  });
});
