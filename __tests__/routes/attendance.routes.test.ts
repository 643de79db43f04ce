import request from 'supertest';
import { createApp } from '../../src/app';
import { Application } from 'express';

const ROSTER_CSV = 'StudentName,Roll\nAlice Kumar,1\nBob Singh,2\nDr. Meera Rao,3\n';
const SIGN_IN_CSV = 'StudentName\nalice kumar\nmeera rao\n';

describe('Attendance Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  const upload = (path: string) =>
    request(app)
      .post(`/api/v1/attendance${path}`)
      .attach('total_file', Buffer.from(ROSTER_CSV), 'total.csv')
      .attach('present_file', Buffer.from(SIGN_IN_CSV), 'present.csv');

  describe('POST /api/v1/attendance/reconcile', () => {
    it('should return the match report', async () => {
      const response = await upload('/reconcile');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('success', true);
      expect(response.body).toHaveProperty('message', '1 of 3 students absent');
      expect(response.body.data.columns).toEqual({ total: 'StudentName', present: 'StudentName' });
      expect(response.body.data.thresholds).toEqual({ fuzzyCutoff: 0.72, tokenCutoff: 0.5 });
      expect(response.body.data.report.unmatchedTotal).toEqual([
        { original: 'Bob Singh', normalized: 'bob singh', sourceIndex: 1 },
      ]);
      expect(response.body.data.report.counts).toEqual({
        total: 3,
        present: 2,
        matched: 2,
        absent: 1,
        unmatchedPresent: 0,
        byStage: { exact: 2, token: 0, fuzzy: 0, closeMatch: 0 },
      });
    });

    it('should apply cutoffs sent as form fields', async () => {
      const response = await upload('/reconcile').field('fuzzyCutoff', '0.9');

      expect(response.status).toBe(200);
      expect(response.body.data.thresholds).toEqual({ fuzzyCutoff: 0.9, tokenCutoff: 0.5 });
    });

    it('should ignore blank form fields', async () => {
      const response = await upload('/reconcile').field('tokenCutoff', '').field('totalColumn', ' ');

      expect(response.status).toBe(200);
      expect(response.body.data.thresholds).toEqual({ fuzzyCutoff: 0.72, tokenCutoff: 0.5 });
      expect(response.body.data.columns.total).toBe('StudentName');
    });

    it('should use the requested name column', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile')
        .field('totalColumn', 'learner')
        .attach('total_file', Buffer.from('Roll,Learner\n1,Alice Kumar\n'), 'total.csv')
        .attach('present_file', Buffer.from(SIGN_IN_CSV), 'present.csv');

      expect(response.status).toBe(200);
      expect(response.body.data.columns).toEqual({ total: 'Learner', present: 'StudentName' });
      expect(response.body.data.report.counts.absent).toBe(0);
    });

    it('should return 400 when a file is missing', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile')
        .attach('total_file', Buffer.from(ROSTER_CSV), 'total.csv');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body).toHaveProperty(
        'error',
        'No file uploaded for "present_file". Please upload both total_file and present_file.'
      );
    });

    it('should return 400 for a file that is not CSV', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile')
        .attach('total_file', Buffer.from(ROSTER_CSV), 'total.csv')
        .attach('present_file', Buffer.from('not a csv'), 'present.png');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('error', 'Only CSV files are allowed (present_file)');
    });

    it('should return 400 for an unknown column', async () => {
      const response = await upload('/reconcile').field('totalColumn', 'Learner');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty(
        'error',
        'Column "Learner" not found. Available columns: StudentName, Roll'
      );
    });

    it('should return 400 for a repeated column header', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile')
        .attach('total_file', Buffer.from('Name,Name\nAlice Kumar,x\n'), 'total.csv')
        .attach('present_file', Buffer.from('name\nalice kumar\n'), 'present.csv');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('error', 'Duplicate column "Name" in CSV header');
    });

    it('should return 400 for a cutoff that is not a number', async () => {
      const response = await upload('/reconcile').field('fuzzyCutoff', 'abc');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty(
        'error',
        'Validation failed: [{"field":"fuzzyCutoff","message":"must be a number"}]'
      );
    });

    it('should return 400 for a cutoff outside [0, 1]', async () => {
      const response = await upload('/reconcile').field('fuzzyCutoff', '1.5');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty(
        'error',
        'Invalid thresholds: fuzzyCutoff must be between 0 and 1'
      );
    });
  });

  describe('POST /api/v1/attendance/absentees', () => {
    it('should download the absent roster rows as CSV', async () => {
      const response = await upload('/absentees');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/text\/csv/);
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="absentees_present.csv"'
      );
      expect(response.text).toBe('StudentName,Roll\nBob Singh,2\n');
    });

    it('should list roster rows with missing cells as blank', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/absentees')
        .attach(
          'total_file',
          Buffer.from('Roll,StudentName\n1,Alice Kumar\n2\n3,Bob Singh\n'),
          'total.csv'
        )
        .attach('present_file', Buffer.from(SIGN_IN_CSV), 'present.csv');

      expect(response.status).toBe(200);
      expect(response.text).toBe('Roll,StudentName\n2,\n3,Bob Singh\n');
    });

    it('should write only the header when everyone signed in', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/absentees')
        .attach('total_file', Buffer.from('StudentName\nAlice Kumar\n'), 'total.csv')
        .attach('present_file', Buffer.from(SIGN_IN_CSV), 'Day 1.csv');

      expect(response.status).toBe(200);
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="absentees_Day_1.csv"'
      );
      expect(response.text).toBe('StudentName\n');
    });
  });

  describe('POST /api/v1/attendance/reconcile/json', () => {
    it('should reconcile JSON records', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile/json')
        .send({
          total: [{ name: 'Avesh Sajiwala' }, { name: 'Bob Singh' }],
          present: [{ name: 'avesh' }],
        });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('message', '1 of 2 students absent');
      expect(response.body.data.thresholds).toEqual({ fuzzyCutoff: 0.72, tokenCutoff: 0.5 });
      expect(response.body.data.report.allocations).toEqual([
        {
          present: { original: 'avesh', normalized: 'avesh', sourceIndex: 0 },
          roster: { original: 'Avesh Sajiwala', normalized: 'avesh sajiwala', sourceIndex: 0 },
          stage: 'token',
          score: 1,
          method: 'token:1.00',
        },
      ]);
    });

    it('should read names from custom fields', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile/json')
        .send({
          total: [{ StudentName: 'Jonathan Smith' }],
          present: [{ signed: 'jonathon smyth' }],
          totalField: 'StudentName',
          presentField: 'signed',
        });

      expect(response.status).toBe(200);
      expect(response.body.data.report.allocations[0].method).toBe('fuzzy:0.86');
    });

    it('should return 400 when a record lacks the name field', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile/json')
        .send({ total: [{ name: 'Alice Kumar' }], present: [{ student: 'alice' }] });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('error', 'present row 1: missing field "name"');
    });

    it('should return 400 for a malformed body', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile/json')
        .send({ total: 'Alice Kumar', present: [] });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Validation failed: /);
    });

    it('should return 400 for invalid JSON', async () => {
      const response = await request(app)
        .post('/api/v1/attendance/reconcile/json')
        .set('Content-Type', 'application/json')
        .send('{"total": [');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('success', false);
    });
  });
});
