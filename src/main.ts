import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';

async function bootstrap() {
	const app = await NestFactory.create(AppModule);

	app.use(helmet());
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle('Supplier Locator API')
		.setDescription(
			`
Resolves facility addresses through an ordered chain of geocoding providers
(Nominatim, LocationIQ, OpenCage, HERE, Mapbox, Google) backed by a durable cache,
and ranks candidate suppliers around the resolved facility.
`,
		)
		.setVersion('1.0')
		.addTag('🌍 Geocoding', 'Address resolution with provider fallback and provenance')
		.addTag('🏭 Suppliers', 'Supplier scoring, deduplication and distance ranking')
		.build();

	const document = SwaggerModule.createDocument(app, config, {
		operationIdFactory: (controllerKey: string, methodKey: string) => {
			const controllerName = controllerKey.replace('Controller', '').toLowerCase();
			return `${controllerName}_${methodKey}`;
		},
	});
	SwaggerModule.setup('api', app, document);

	const port = parseInt(process.env.PORT || '3000', 10);
	await app.listen(port);
	Logger.log(`Supplier Locator listening on port ${port}`, 'Bootstrap');
}

void bootstrap();
