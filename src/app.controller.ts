import { Controller, Get, Res } from "@nestjs/common"
import { AppService } from "./app.service"
import type { Response } from "express"

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getStatus(): string {
    return this.appService.getStatus()
  }

  @Get("health/db")
  async checkDatabase() {
    return this.appService.testConnection()
  }

  @Get("favicon.ico")
  getFavicon(@Res() res: Response) {
    res.status(204).end()
  }
}
