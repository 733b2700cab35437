import express, { Application, Request, Response } from 'express';
import morgan from 'morgan';
import cors, { CorsOptions } from 'cors';
import cookieParser from 'cookie-parser';
import router from '@/routes';
import { apiLimiter, errorHandler, notFound } from '@/middlewares';
import status from 'http-status';
import config from '@/config';

const app: Application = express();

const allowedOrigins = config.CORS_ORIGINS?.split(',').map((origin) => origin.trim()).filter(Boolean);

const corsOptions: CorsOptions = {
  // reflect the request origin when no allow-list is configured
  origin: allowedOrigins && allowedOrigins.length > 0 ? allowedOrigins : true,
  credentials: true,
  optionsSuccessStatus: status.OK
};

app.set('trust proxy', 1);
app.use(express.json({ limit: '100kb' }));
app.use(cookieParser());
app.use(cors(corsOptions));
if (config.NODE_ENV !== 'test') {
  app.use(morgan('dev'));
}

app.use('/api/v1', apiLimiter, router)

const entryRoute = (req: Request, res: Response) => {
  const message = 'Server is running...';
  res.send(message)
}

app.get('/', entryRoute)

app.use(notFound);

app.use(errorHandler);

export default app;
