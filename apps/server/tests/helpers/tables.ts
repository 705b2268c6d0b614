import request from 'supertest';
import type { Application } from 'express';
import type { CreateTablePayload, CreateTableResponse } from '@feltcast/shared';

export interface HostedTable extends CreateTableResponse {
  token: string;
  auth: { Authorization: string };
}

/** Creates a table over HTTP and signs in as its host. */
export async function createHostedTable(
  app: Application,
  payload: CreateTablePayload,
): Promise<HostedTable> {
  const created = await request(app).post('/api/tables').send(payload);
  if (created.status !== 201) {
    throw new Error(`create failed: ${created.status} ${JSON.stringify(created.body)}`);
  }
  const body: CreateTableResponse = created.body;

  const signIn = await request(app)
    .post(`/api/tables/${body.tableId}/host-token`)
    .send({ hostCode: body.hostCode });
  if (signIn.status !== 200) {
    throw new Error(`host sign-in failed: ${signIn.status} ${JSON.stringify(signIn.body)}`);
  }
  const token: string = signIn.body.token;

  return { ...body, token, auth: { Authorization: `Bearer ${token}` } };
}
