import { Response } from 'express';
import { sendSuccess, sendError, sendCsv } from '../../src/utils/response';

// Mock Express Response
const mockResponse = (): Response => {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  res.send = jest.fn().mockReturnValue(res);
  res.type = jest.fn().mockReturnValue(res);
  res.attachment = jest.fn().mockReturnValue(res);
  return res as Response;
};

describe('Response Utils', () => {
  describe('sendSuccess', () => {
    it('should send success response with data', () => {
      const res = mockResponse();
      const data = { id: 1, name: 'Test' };

      sendSuccess(res, data);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          success: true,
          data,
          timestamp: expect.any(String),
        })
      );
    });

    it('should send success response with message', () => {
      const res = mockResponse();
      const data = { id: 1 };

      sendSuccess(res, data, 'Created successfully', 201);

      expect(res.status).toHaveBeenCalledWith(201);
      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          success: true,
          data,
          message: 'Created successfully',
        })
      );
    });

    it('should use custom status code', () => {
      const res = mockResponse();

      sendSuccess(res, null, undefined, 204);

      expect(res.status).toHaveBeenCalledWith(204);
    });
  });

  describe('sendError', () => {
    it('should send error response', () => {
      const res = mockResponse();

      sendError(res, 'Something went wrong');

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          success: false,
          error: 'Something went wrong',
          timestamp: expect.any(String),
        })
      );
    });

    it('should send error with custom status code', () => {
      const res = mockResponse();

      sendError(res, 'Not found', 404);

      expect(res.status).toHaveBeenCalledWith(404);
    });

    it('should send error with message', () => {
      const res = mockResponse();

      sendError(res, 'Validation error', 400, 'Please check your input');

      expect(res.json).toHaveBeenCalledWith(
        expect.objectContaining({
          success: false,
          error: 'Validation error',
          message: 'Please check your input',
        })
      );
    });
  });

  describe('sendCsv', () => {
    it('should send CSV content as an attachment', () => {
      const res = mockResponse();
      const content = 'StudentName\nBob Singh\n';

      sendCsv(res, 'absentees_day1.csv', content);

      expect(res.attachment).toHaveBeenCalledWith('absentees_day1.csv');
      expect(res.type).toHaveBeenCalledWith('text/csv');
      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.send).toHaveBeenCalledWith(content);
    });

    it('should not send a JSON envelope', () => {
      const res = mockResponse();

      sendCsv(res, 'absentees.csv', '');

      expect(res.json).not.toHaveBeenCalled();
    });
  });
});
