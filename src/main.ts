import "reflect-metadata"
import { NestFactory } from "@nestjs/core"
import { Logger } from "@nestjs/common"
import { ConfigService } from "@nestjs/config"
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger"
import { AppModule } from "./app.module"
import { configureApp } from "./app.setup"
import { USER_ID_HEADER } from "./common/decorators/current-user-id.decorator"

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule))
  const configService = app.get(ConfigService)

  /* --------------------------- */
  /* 🌍 Allow requests from other websites (CORS)
   *
   * - `origin`: comma-separated list from CORS_ORIGIN
   * - `credentials`: allows cookies or authorization headers
   */
  const origins = configService.getOrThrow<string>("CORS_ORIGIN")

  app.enableCors({
    origin: origins
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    credentials: true,
  })

  /* --------------------------- */
  /* 📘 Swagger API documentation at /docs
   *
   * The caller id normally comes from the gateway; in Swagger it can be
   * typed into the `user-id` API key.
   */
  const swaggerConfig = new DocumentBuilder()
    .setTitle("Weekly Planner API")
    .setDescription("Weekly recurring plans per user")
    .setVersion("1.0.0")
    .addApiKey(
      { type: "apiKey", in: "header", name: USER_ID_HEADER },
      "user-id",
    )
    .build()

  const document = SwaggerModule.createDocument(app, swaggerConfig)
  SwaggerModule.setup("docs", app, document, {
    swaggerOptions: {
      persistAuthorization: true,
    },
  })

  /* --------------------------- */
  /* 🚀 Start the app on the configured port */
  const port = parseInt(configService.getOrThrow<string>("PORT"), 10)
  app.enableShutdownHooks()
  await app.listen(port)
  new Logger("Bootstrap").log(`Listening on port ${port}`)
}

void bootstrap()
