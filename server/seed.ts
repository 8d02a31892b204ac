import { pathToFileURL } from 'url';
import { storage } from './storage';
import { closeDb } from './db';
import { parseSearchQuery } from './search';

async function seedArtists() {
  console.log('Seeding artists...');
  const meera = await storage.createUser({ name: 'Meera Joshi', email: 'meera@example.com' });
  const arjun = await storage.createUser({ name: 'Arjun Rao', email: 'arjun@example.com' });
  const lena = await storage.createUser({ name: 'Lena Fischer', email: 'lena@example.com' });
  console.log('Seeded 3 artists');
  return { meera, arjun, lena };
}

export async function seedDatabase() {
  console.log('=== Starting listing seed ===');

  try {
    const existing = await storage.searchProducts(parseSearchQuery(''));
    if (existing.length > 0) {
      console.log('Listings already seeded, skipping');
      return;
    }

    const { meera, arjun, lena } = await seedArtists();

    console.log('Seeding posts...');
    await storage.createPost({ postTitle: 'Morning at the wheel', description: 'Throwing a new set of bowls #pottery #studio', artistId: meera.id });
    await storage.createPost({ postTitle: 'Loom progress', description: 'Halfway through a cotton runner #weaving #handmade', artistId: arjun.id });
    await storage.createPost({ postTitle: 'Silver sketches', description: 'Ideas for a winter collection #jewelry', artistId: lena.id });

    console.log('Seeding products...');
    const bowl = await storage.createProduct({ title: 'Glazed serving bowl', description: 'Stoneware bowl in celadon glaze #pottery #handmade', price: '450.00', artistId: meera.id });
    const mugs = await storage.createProduct({ title: 'Pair of speckled mugs', description: 'Two mugs, dishwasher safe #pottery', price: '320.00', artistId: meera.id });
    const runner = await storage.createProduct({ title: 'Cotton table runner', description: 'Handwoven runner with indigo stripes #weaving #handmade', price: '1200.00', artistId: arjun.id });
    const earrings = await storage.createProduct({ title: 'Silver leaf earrings', description: 'Sterling silver, hand cut #jewelry #handmade', price: '850.00', artistId: lena.id });

    console.log('Seeding reviews...');
    await storage.createReview({ productId: bowl.productId, userId: arjun.id, rating: 5 });
    await storage.createReview({ productId: bowl.productId, userId: lena.id, rating: 4 });
    await storage.createReview({ productId: mugs.productId, userId: lena.id, rating: 3 });
    await storage.createReview({ productId: runner.productId, userId: meera.id, rating: 5 });
    await storage.createReview({ productId: earrings.productId, userId: meera.id, rating: 4 });

    console.log('=== Listing seed complete ===');
  } catch (error) {
    console.error('Seed error:', error);
    throw error;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  seedDatabase()
    .then(() => closeDb())
    .then(() => process.exit(0))
    .catch((error) => {
      console.error('[Seed] Failed:', error);
      process.exit(1);
    });
}
