import { Router } from "express";
import { queryRouter } from "@/modules/query/query.routes";
import { faqRouter } from "@/modules/faq/faq.routes";
import { dashboardRouter } from "@/modules/dashboard/dashboard.routes";
import { adminRouter } from "@/modules/admin/admin.routes";
import { studentRouter } from "@/modules/student/student.routes";
import { blockedEmailRouter } from "@/modules/blocked-email/blocked-email.routes";
const router = Router();

type Route = {
  path: string;
  route: Router;
}

const moduleRoutes: Route[] = [
  {
    path: '/queries',
    route: queryRouter
  },
  {
    path: '/faqs',
    route: faqRouter
  },
  {
    path: '/dashboard',
    route: dashboardRouter
  },
  {
    path: '/admins',
    route: adminRouter
  },
  {
    path: '/students',
    route: studentRouter
  },
  {
    path: '/blocked-emails',
    route: blockedEmailRouter
  }
];

moduleRoutes.forEach((route) => router.use(route.path, route.route));

export default router;
