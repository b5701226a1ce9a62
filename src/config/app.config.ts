export const appConfig = {
  port: process.env.PORT ? parseInt(process.env.PORT, 10) : 3000,
  apiPrefix: process.env.API_PREFIX ?? '',
  corsOrigin: process.env.CORS_ORIGIN ?? 'http://localhost:5173',
};
