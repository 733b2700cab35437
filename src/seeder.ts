import config from '@/config';
import { adminService } from '@/container';

export const seedDefaultAdmin = () =>
  adminService.bootstrapDefaultAdmin({
    username: config.DEFAULT_ADMIN_USERNAME,
    email: config.DEFAULT_ADMIN_EMAIL,
    name: 'Administrator',
    password: config.DEFAULT_ADMIN_PASSWORD,
  });
